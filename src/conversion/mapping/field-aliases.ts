import { MappedField } from '../dto/field-mapping.dto';

/**
 * Header spellings recognised for each universal field, in priority order.
 *
 * Keys are compared lowercased and trimmed. The first alias that matches any
 * observed header wins, so the canonical name always beats a looser synonym
 * ("meter_id" before "meter", "reading_date" before "date").
 */
export const FIELD_ALIASES: Readonly<Record<MappedField, readonly string[]>> = {
  meter_id: [
    'meter_id',
    'meter',
    'meter_number',
    'meter_no',
    'compteur',
    'id_compteur',
    'numero_compteur',
    'num_compteur',
    'pdl',
    'prm',
  ],
  customer_id: [
    'customer_id',
    'customer',
    'customer_number',
    'client_id',
    'client',
    'id_client',
    'numero_client',
    'account_id',
    'account',
  ],
  reading_value: [
    'reading_value',
    'value',
    'reading',
    'valeur',
    'valeur_releve',
    'releve',
    'index',
    'consumption',
    'consommation',
  ],
  reading_date: [
    'reading_date',
    'date',
    'date_releve',
    'reading_dt',
    'date_lecture',
    'timestamp',
  ],
  unit: ['unit', 'unite', 'unité', 'uom'],
  source_system: [
    'source_system',
    'systeme_source',
    'source',
    'system',
    'systeme',
  ],
};
