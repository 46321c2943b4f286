import { RawRow } from '../dto/universal-row.dto';

/**
 * Format tags understood by the pipeline. A file's tag is its lowercased
 * extension.
 */
export const SOURCE_FORMATS = ['csv', 'txt', 'tsv', 'json', 'xlsx', 'exl'] as const;

export type SourceFormat = (typeof SOURCE_FORMATS)[number];

export function isSourceFormat(tag: string): tag is SourceFormat {
  return SOURCE_FORMATS.some((format) => format === tag);
}

/** Receives the trimmed header row once, before the first data row. */
export type HeaderListener = (headers: readonly string[]) => void;

/**
 * ISourceReader - one strategy per family of source formats.
 *
 * A reader turns the complete file bytes into raw rows keyed by source
 * column name. It does not know about field mappings or the universal
 * schema; rows are handed to the normalizer untouched apart from header
 * trimming.
 *
 * The returned generator is single-pass. Call `read` again to re-read.
 */
export interface ISourceReader {
  /** Identifier used in logs. */
  readonly name: string;

  readonly description: string;

  /** Format tags this reader is registered for. */
  readonly formats: readonly SourceFormat[];

  /**
   * @throws FormatError when the bytes cannot be decoded as the format
   * @throws ShapeError when the document decodes but is not row-shaped
   */
  read(
    buffer: Buffer,
    format: SourceFormat,
    onHeaders?: HeaderListener,
  ): AsyncGenerator<RawRow>;
}
