/**
 * Error taxonomy for the conversion pipeline.
 *
 * Every failure the pipeline raises on purpose is a ConversionError subclass,
 * so front ends can tell an operator mistake (bad mapping, bad file) from a
 * crash and report it as-is.
 */
export type ConversionErrorKind = 'mapping' | 'format' | 'validation' | 'shape';

export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;
}

export type MappingFailure = 'missing' | 'unresolvable' | 'invalid';

/**
 * Field mapping could not be built: a required field is absent from an
 * explicit declaration, or no header matched its aliases.
 */
export class MappingError extends ConversionError {
  readonly kind = 'mapping';

  constructor(
    public readonly failure: MappingFailure,
    public readonly field: string,
    message?: string,
  ) {
    super(message ?? MappingError.describe(failure, field));
    this.name = 'MappingError';
  }

  private static describe(failure: MappingFailure, field: string): string {
    switch (failure) {
      case 'missing':
        return `Missing field mapping for "${field}"`;
      case 'unresolvable':
        return `Cannot infer a source column for "${field}" from the file headers`;
      case 'invalid':
        return `Invalid field mapping declaration (${field})`;
    }
  }
}

/**
 * Unsupported format tag, or a container/document that cannot be opened.
 */
export class FormatError extends ConversionError {
  readonly kind = 'format';

  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * A single row failed normalization.
 */
export class ValidationError extends ConversionError {
  readonly kind = 'validation';

  constructor(
    public readonly reason: string,
    public readonly rowNumber?: number,
  ) {
    super(rowNumber === undefined ? reason : `Row ${rowNumber}: ${reason}`);
    this.name = 'ValidationError';
  }

  /** Same reason, attached to a 1-based data row number. */
  atRow(rowNumber: number): ValidationError {
    return new ValidationError(this.reason, rowNumber);
  }
}

/**
 * JSON payload is not list-shaped, or holds a non-object element.
 */
export class ShapeError extends ConversionError {
  readonly kind = 'shape';

  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
