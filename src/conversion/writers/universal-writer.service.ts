import { Injectable } from '@nestjs/common';
import { extname } from 'node:path';
import {
  UNIVERSAL_FIELDS,
  UniversalRow,
  toRecordValues,
} from '../dto/universal-row.dto';
import { FormatError } from '../interfaces/conversion-error';
import { SpreadsheetCodec } from '../spreadsheet/spreadsheet.codec';

export type OutputTarget = 'delimited' | 'spreadsheet';

const TARGETS_BY_EXTENSION = new Map<string, OutputTarget>([
  ['csv', 'delimited'],
  ['txt', 'delimited'],
  ['xlsx', 'spreadsheet'],
  ['exl', 'spreadsheet'],
]);

/** Quote a field when it holds a comma, a quote or a line break. */
export function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Universal Writer
 *
 * Serializes normalized rows in the fixed universal column order, header
 * row first. An empty row list still produces the header.
 */
@Injectable()
export class UniversalWriterService {
  constructor(private readonly codec: SpreadsheetCodec) {}

  /**
   * Output target for a file path (`out/readings.csv`) or a bare tag
   * (`xlsx`).
   *
   * @throws FormatError for anything other than csv, txt, xlsx and exl
   */
  outputTargetFor(pathOrTag: string): OutputTarget {
    const extension = extname(pathOrTag);
    const tag = (extension ? extension.slice(1) : pathOrTag).toLowerCase();
    const target = TARGETS_BY_EXTENSION.get(tag);
    if (!target) {
      throw new FormatError(`Unsupported output format: ${pathOrTag}`);
    }
    return target;
  }

  async write(
    rows: readonly UniversalRow[],
    target: OutputTarget,
  ): Promise<Buffer> {
    if (target === 'spreadsheet') {
      return this.codec.encode(rows);
    }
    return Buffer.from(this.toDelimited(rows), 'utf-8');
  }

  private toDelimited(rows: readonly UniversalRow[]): string {
    const lines = [
      UNIVERSAL_FIELDS.join(','),
      ...rows.map((row) => toRecordValues(row).map(quoteField).join(',')),
    ];
    return `${lines.join('\n')}\n`;
  }
}
