import {
  DEFAULT_UNIT,
  FieldMapping,
} from '../dto/field-mapping.dto';
import { RawCell, RawRow, UniversalRow } from '../dto/universal-row.dto';
import { ValidationError } from '../interfaces/conversion-error';
import { parseWithFallback } from './date-patterns';

const DECIMAL_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Outcome of normalizing one row, with the date pattern that matched so the
 * caller can notice fallback parsing.
 */
export interface NormalizedRow {
  row: UniversalRow;
  datePattern: string;
}

function cellToText(value: RawCell | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Trimmed text of the column a mapping points at.
 * An empty column name, an absent key and a null cell all read as "".
 */
export function pick(row: RawRow, column: string): string {
  if (!column || !Object.hasOwn(row, column)) return '';
  return cellToText(row[column]);
}

/** Mapped value, or `fallback` when unmapped or empty. */
function pickOrDefault(row: RawRow, column: string, fallback: string): string {
  const value = pick(row, column);
  return value === '' ? fallback : value;
}

export function parseReadingValue(raw: string): number {
  if (!DECIMAL_NUMBER.test(raw)) {
    throw new ValidationError(`reading_value is not a number: "${raw}"`);
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`reading_value is not a number: "${raw}"`);
  }
  return value;
}

/**
 * Fixed-point text with three decimals. `toFixed` switches to exponent
 * notation from 1e21 up; such doubles are whole numbers, so their integer
 * digits are exact.
 */
export function formatReadingValue(value: number): string {
  if (Math.abs(value) < 1e21) return value.toFixed(3);
  return `${BigInt(value).toString()}.000`;
}

/**
 * Apply a mapping to one raw row.
 *
 * @throws ValidationError with a human-readable reason
 */
export function normalizeRowDetailed(
  raw: RawRow,
  mapping: FieldMapping,
  defaultSourceName: string,
): NormalizedRow {
  const meterId = pick(raw, mapping.meter_id);
  const customerId = pick(raw, mapping.customer_id);
  const rawValue = pick(raw, mapping.reading_value);
  const rawDate = pick(raw, mapping.reading_date);

  if (!meterId) {
    throw new ValidationError('meter_id is empty');
  }
  if (!customerId) {
    throw new ValidationError('customer_id is empty');
  }

  const readingValue = parseReadingValue(rawValue);

  const date = parseWithFallback(rawDate, mapping.date_format);
  if (!date) {
    throw new ValidationError(
      `reading_date is not a valid date: "${rawDate}" (expected format ${mapping.date_format})`,
    );
  }

  return {
    row: {
      meter_id: meterId,
      customer_id: customerId,
      reading_value: formatReadingValue(readingValue),
      reading_date: date.iso,
      unit: pickOrDefault(raw, mapping.unit, DEFAULT_UNIT),
      source_system: pickOrDefault(
        raw,
        mapping.source_system,
        defaultSourceName,
      ),
    },
    datePattern: date.pattern,
  };
}

export function normalizeRow(
  raw: RawRow,
  mapping: FieldMapping,
  defaultSourceName: string,
): UniversalRow {
  return normalizeRowDetailed(raw, mapping, defaultSourceName).row;
}
