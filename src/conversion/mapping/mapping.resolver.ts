import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  DEFAULT_EXPLICIT_DATE_FORMAT,
  DEFAULT_INFERRED_DATE_FORMAT,
  FieldMapping,
  MappedField,
  OPTIONAL_MAPPING_FIELDS,
  REQUIRED_MAPPING_FIELDS,
} from '../dto/field-mapping.dto';
import { MappingError } from '../interfaces/conversion-error';
import { compileDatePattern } from '../normalizer/date-patterns';
import { FIELD_ALIASES } from './field-aliases';

const columnName = z.string().nullish();

/**
 * Shape of a mapping declaration, as found in a mapping file or in the
 * `mapping` member of a convert request. Unknown keys are dropped.
 */
export const mappingDeclarationSchema = z.object({
  meter_id: columnName,
  customer_id: columnName,
  reading_value: columnName,
  reading_date: columnName,
  unit: columnName,
  source_system: columnName,
  date_format: columnName,
});

export type MappingDeclaration = z.infer<typeof mappingDeclarationSchema>;

/**
 * Validate an untrusted declaration (parsed JSON).
 *
 * @throws MappingError when the value is not an object of strings
 */
export function parseMappingDeclaration(input: unknown): MappingDeclaration {
  const result = mappingDeclarationSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'declaration';
    throw new MappingError(
      'invalid',
      where,
      `Invalid field mapping declaration at "${where}": ${issue.message}`,
    );
  }
  return result.data;
}

/**
 * Read and validate a JSON mapping declaration from disk.
 */
export async function loadMappingFile(path: string): Promise<MappingDeclaration> {
  const text = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new MappingError(
      'invalid',
      path,
      `Mapping file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseMappingDeclaration(parsed);
}

const hasText = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.trim() !== '';

/** True when the declaration names at least one column or a date pattern. */
export function isDeclared(
  declaration: MappingDeclaration | null | undefined,
): declaration is MappingDeclaration {
  if (!declaration) return false;
  return Object.values(declaration).some((value) => hasText(value));
}

/** True when all four required columns are declared. */
export function isCompleteDeclaration(
  declaration: MappingDeclaration | null | undefined,
): declaration is MappingDeclaration {
  if (!declaration) return false;
  return REQUIRED_MAPPING_FIELDS.every((field) => hasText(declaration[field]));
}

/**
 * Build a FieldMapping from an explicit declaration, used verbatim.
 *
 * @throws MappingError (missing) naming the first absent required field,
 *   or (invalid) for a date format with an unsupported directive
 */
export function mappingFromDeclaration(
  declaration: MappingDeclaration,
): FieldMapping {
  for (const field of REQUIRED_MAPPING_FIELDS) {
    if (!hasText(declaration[field])) {
      throw new MappingError('missing', field);
    }
  }

  const dateFormat = hasText(declaration.date_format)
    ? declaration.date_format
    : DEFAULT_EXPLICIT_DATE_FORMAT;
  compileDatePattern(dateFormat);

  return {
    meter_id: declaration.meter_id ?? '',
    customer_id: declaration.customer_id ?? '',
    reading_value: declaration.reading_value ?? '',
    reading_date: declaration.reading_date ?? '',
    unit: declaration.unit ?? '',
    source_system: declaration.source_system ?? '',
    date_format: dateFormat,
  };
}

/**
 * Find the observed header matching a field's aliases, first alias first.
 * Returns the header exactly as observed, or undefined.
 */
export function findColumn(
  field: MappedField,
  observedHeaders: readonly string[],
): string | undefined {
  const byKey = new Map<string, string>();
  for (const header of observedHeaders) {
    const key = header.trim().toLowerCase();
    if (!byKey.has(key)) {
      byKey.set(key, header);
    }
  }

  for (const alias of FIELD_ALIASES[field]) {
    const header = byKey.get(alias);
    if (header !== undefined) {
      return header;
    }
  }
  return undefined;
}

/**
 * Infer a FieldMapping from the headers of a source file.
 *
 * @throws MappingError (unresolvable) for the first required field with no match
 */
export function inferMapping(observedHeaders: readonly string[]): FieldMapping {
  const resolved: Partial<Record<MappedField, string>> = {};

  for (const field of REQUIRED_MAPPING_FIELDS) {
    const column = findColumn(field, observedHeaders);
    if (column === undefined) {
      throw new MappingError('unresolvable', field);
    }
    resolved[field] = column;
  }
  for (const field of OPTIONAL_MAPPING_FIELDS) {
    resolved[field] = findColumn(field, observedHeaders) ?? '';
  }

  return {
    meter_id: resolved.meter_id ?? '',
    customer_id: resolved.customer_id ?? '',
    reading_value: resolved.reading_value ?? '',
    reading_date: resolved.reading_date ?? '',
    unit: resolved.unit ?? '',
    source_system: resolved.source_system ?? '',
    date_format: DEFAULT_INFERRED_DATE_FORMAT,
  };
}

/**
 * Resolve the mapping for a job: a non-empty explicit declaration wins,
 * otherwise the mapping is inferred from the observed headers.
 */
export function resolveMapping(
  explicit?: MappingDeclaration | null,
  observedHeaders: readonly string[] = [],
): FieldMapping {
  if (isDeclared(explicit)) {
    return mappingFromDeclaration(explicit);
  }
  return inferMapping(observedHeaders);
}
