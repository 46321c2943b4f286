import { Injectable, Logger } from '@nestjs/common';
import { extname } from 'node:path';
import { RawRow } from '../dto/universal-row.dto';
import { FormatError } from '../interfaces/conversion-error';
import { DelimitedReader } from './delimited.reader';
import { JsonReader } from './json.reader';
import {
  HeaderListener,
  ISourceReader,
  SourceFormat,
  isSourceFormat,
} from './source-reader.interface';
import { SpreadsheetReader } from './spreadsheet.reader';

/**
 * SourceReaderService - format tag -> reader strategy.
 *
 * Adding a format means adding a reader and registering it here; callers
 * only ever see `read(buffer, tag)`.
 */
@Injectable()
export class SourceReaderService {
  private readonly logger = new Logger(SourceReaderService.name);
  private readonly readers = new Map<SourceFormat, ISourceReader>();

  constructor(
    private readonly delimitedReader: DelimitedReader,
    private readonly jsonReader: JsonReader,
    private readonly spreadsheetReader: SpreadsheetReader,
  ) {
    for (const reader of [
      this.delimitedReader,
      this.jsonReader,
      this.spreadsheetReader,
    ]) {
      for (const format of reader.formats) {
        this.readers.set(format, reader);
      }
    }
  }

  /**
   * Format tag of a file name, from its extension.
   *
   * @throws FormatError for extensions no reader handles
   */
  detectFormat(filename: string): SourceFormat {
    const extension = extname(filename).slice(1).toLowerCase();
    if (!isSourceFormat(extension)) {
      throw new FormatError(
        `Unsupported file extension: ${extension ? `.${extension}` : filename}`,
      );
    }
    return extension;
  }

  /**
   * Lazily read raw rows from the bytes of a file in the given format.
   * `onHeaders` receives the source's header row, even when no data row
   * follows it.
   *
   * @throws FormatError for an unknown tag (raised on first iteration)
   */
  async *read(
    buffer: Buffer,
    format: string,
    onHeaders?: HeaderListener,
  ): AsyncGenerator<RawRow> {
    const tag = format.trim().toLowerCase();
    if (!isSourceFormat(tag)) {
      throw new FormatError(`Unsupported format: ${format}`);
    }
    const reader = this.readers.get(tag);
    if (!reader) {
      throw new FormatError(`No reader registered for format: ${tag}`);
    }

    this.logger.debug(`Reading ${buffer.length} bytes as ${tag} via ${reader.name}`);
    yield* reader.read(buffer, tag, onHeaders);
  }
}
