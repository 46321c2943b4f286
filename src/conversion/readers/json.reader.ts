import { Injectable } from '@nestjs/common';
import { RawCell, RawRow } from '../dto/universal-row.dto';
import { FormatError, ShapeError } from '../interfaces/conversion-error';
import {
  HeaderListener,
  ISourceReader,
  SourceFormat,
} from './source-reader.interface';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRawCell(value: unknown): RawCell {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  // nested objects and arrays travel as their JSON text
  return JSON.stringify(value);
}

/**
 * JSON Reader
 *
 * Accepts either a top-level array of row objects or an object carrying
 * such an array under `readings`.
 */
@Injectable()
export class JsonReader implements ISourceReader {
  readonly name = 'json';
  readonly description = 'JSON array of reading objects';
  readonly formats: readonly SourceFormat[] = ['json'];

  async *read(
    buffer: Buffer,
    _format: SourceFormat,
    onHeaders?: HeaderListener,
  ): AsyncGenerator<RawRow> {
    const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new FormatError(
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const records = this.extractRecords(document);
    for (const [index, record] of records.entries()) {
      if (!isPlainObject(record)) {
        throw new ShapeError(`JSON row ${index + 1} is not an object`);
      }
      const row: RawRow = {};
      for (const [key, value] of Object.entries(record)) {
        row[key] = toRawCell(value);
      }
      // a document has no header row; the first record's keys stand in
      if (index === 0) onHeaders?.(Object.keys(row));
      yield row;
    }
  }

  private extractRecords(document: unknown): unknown[] {
    if (Array.isArray(document)) return document;
    if (isPlainObject(document) && Array.isArray(document.readings)) {
      return document.readings;
    }
    throw new ShapeError(
      'JSON content must be a list of rows or an object with a "readings" list',
    );
  }
}
