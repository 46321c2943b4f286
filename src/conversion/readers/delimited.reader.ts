import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { RawRow } from '../dto/universal-row.dto';
import {
  HeaderListener,
  ISourceReader,
  SourceFormat,
} from './source-reader.interface';

export const DELIMITER_CANDIDATES = [',', ';', '\t', '|'] as const;

const SNIFF_SAMPLE_SIZE = 4096;

/**
 * Guess the field delimiter from the start of the text.
 *
 * A candidate qualifies when it occurs, outside double quotes, the same
 * non-zero number of times on every complete line of the sample. The
 * qualifying candidate with the most occurrences per line wins, earlier
 * candidates winning ties. Falls back to a comma.
 */
export function detectDelimiter(text: string): string {
  const sample = text.slice(0, SNIFF_SAMPLE_SIZE);
  const truncated = text.length > SNIFF_SAMPLE_SIZE;

  const lines: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const char of sample) {
    if (char === '"') inQuotes = !inQuotes;
    if (char === '\n' && !inQuotes) {
      lines.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  // A trailing fragment is a complete line only when the whole text fit.
  if (!truncated) lines.push(current);

  const sampled = lines.filter((line) => line.trim() !== '');
  if (sampled.length === 0) return ',';

  let best: string = ',';
  let bestCount = 0;
  for (const candidate of DELIMITER_CANDIDATES) {
    const counts = sampled.map((line) => countOutsideQuotes(line, candidate));
    const first = counts[0];
    if (first === 0 || counts.some((count) => count !== first)) continue;
    if (first > bestCount) {
      best = candidate;
      bestCount = first;
    }
  }
  return best;
}

function countOutsideQuotes(line: string, delimiter: string): number {
  let count = 0;
  let inQuotes = false;
  for (const char of line) {
    if (char === '"') inQuotes = !inQuotes;
    else if (char === delimiter && !inQuotes) count++;
  }
  return count;
}

function toRawRow(record: unknown): RawRow {
  const row: RawRow = {};
  if (typeof record !== 'object' || record === null) return row;
  for (const [key, value] of Object.entries(record)) {
    row[key] = typeof value === 'string' ? value : String(value);
  }
  return row;
}

/**
 * Delimited Text Reader
 *
 * Handles comma/semicolon/tab/pipe separated exports (`.csv`, `.txt`) and
 * tab separated files (`.tsv`, delimiter forced).
 *
 * - UTF-8, leading byte order mark dropped
 * - header row names the columns (trimmed), later rows zip by position
 * - rows whose cells are all empty are skipped
 */
@Injectable()
export class DelimitedReader implements ISourceReader {
  private readonly logger = new Logger(DelimitedReader.name);

  readonly name = 'delimited';
  readonly description = 'Delimited text (CSV, TXT, TSV)';
  readonly formats: readonly SourceFormat[] = ['csv', 'txt', 'tsv'];

  async *read(
    buffer: Buffer,
    format: SourceFormat,
    onHeaders?: HeaderListener,
  ): AsyncGenerator<RawRow> {
    const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
    const separator = format === 'tsv' ? '\t' : detectDelimiter(text);
    this.logger.debug(`Reading ${format} with delimiter ${JSON.stringify(separator)}`);

    const stream = Readable.from(Buffer.from(text, 'utf-8')).pipe(
      csvParser({
        separator,
        mapHeaders: ({ header }) => header.trim(),
      }),
    );
    stream.on('headers', (headers: unknown) => {
      if (onHeaders && Array.isArray(headers)) {
        onHeaders(headers.map(String));
      }
    });

    for await (const record of stream) {
      const row = toRawRow(record);
      const blank = Object.values(row).every(
        (value) => value === null || String(value).trim() === '',
      );
      if (blank) continue;
      yield row;
    }
  }
}
