import { Injectable } from '@nestjs/common';
import { RawRow } from '../dto/universal-row.dto';
import { SpreadsheetCodec } from '../spreadsheet/spreadsheet.codec';
import {
  HeaderListener,
  ISourceReader,
  SourceFormat,
} from './source-reader.interface';

/**
 * Spreadsheet Reader - first worksheet of an `.xlsx` / `.exl` workbook.
 */
@Injectable()
export class SpreadsheetReader implements ISourceReader {
  readonly name = 'spreadsheet';
  readonly description = 'Spreadsheet workbook (XLSX, EXL)';
  readonly formats: readonly SourceFormat[] = ['xlsx', 'exl'];

  constructor(private readonly codec: SpreadsheetCodec) {}

  read(
    buffer: Buffer,
    _format: SourceFormat,
    onHeaders?: HeaderListener,
  ): AsyncGenerator<RawRow> {
    return this.codec.decode(buffer, onHeaders);
  }
}
