/**
 * FieldMapping
 *
 * Names the source column that feeds each universal field, plus the pattern
 * used to read dates. Built once per job, read-only afterwards.
 *
 * The four identifying columns are always non-empty. `unit` and
 * `source_system` may be empty, meaning "use the default value".
 */
export interface FieldMapping {
  readonly meter_id: string;
  readonly customer_id: string;
  readonly reading_value: string;
  readonly reading_date: string;
  readonly unit: string;
  readonly source_system: string;
  /** strptime-style pattern, e.g. `%d/%m/%Y` */
  readonly date_format: string;
}

export const REQUIRED_MAPPING_FIELDS = [
  'meter_id',
  'customer_id',
  'reading_value',
  'reading_date',
] as const;

export const OPTIONAL_MAPPING_FIELDS = ['unit', 'source_system'] as const;

export type RequiredMappingField = (typeof REQUIRED_MAPPING_FIELDS)[number];
export type OptionalMappingField = (typeof OPTIONAL_MAPPING_FIELDS)[number];
export type MappedField = RequiredMappingField | OptionalMappingField;

/** Pattern applied to explicit declarations that do not name one. */
export const DEFAULT_EXPLICIT_DATE_FORMAT = '%Y-%m-%d';

/** Pattern assumed when the mapping is inferred from headers. */
export const DEFAULT_INFERRED_DATE_FORMAT = '%d/%m/%Y';

export const DEFAULT_UNIT = 'kWh';
