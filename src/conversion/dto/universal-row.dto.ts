/**
 * UniversalRow
 *
 * Canonical reading record produced by normalization, whatever the source
 * metering system. Field names double as the column headers of every output
 * file, so the order of UNIVERSAL_FIELDS is the output column order.
 *
 * Invariants once built:
 * - every field is non-empty (unit/source_system defaults already applied)
 * - reading_value has exactly three decimals ("100.500")
 * - reading_date is an ISO calendar date ("2026-01-01")
 */
export const UNIVERSAL_FIELDS = [
  'meter_id',
  'customer_id',
  'reading_value',
  'reading_date',
  'unit',
  'source_system',
] as const;

export type UniversalField = (typeof UNIVERSAL_FIELDS)[number];

export type UniversalRow = Readonly<Record<UniversalField, string>>;

/** Value of one source cell before normalization. */
export type RawCell = string | number | boolean | null;

/**
 * One source record keyed by source column name.
 * Produced by a reader, consumed once by the normalizer.
 */
export type RawRow = Record<string, RawCell>;

/** Values of a row in output column order. */
export function toRecordValues(row: UniversalRow): string[] {
  return UNIVERSAL_FIELDS.map((field) => row[field]);
}
