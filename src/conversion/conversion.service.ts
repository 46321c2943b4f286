import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile, writeFile } from 'node:fs/promises';
import { FieldMapping } from './dto/field-mapping.dto';
import { RawRow, UniversalRow } from './dto/universal-row.dto';
import {
  ValidationError,
  isConversionError,
} from './interfaces/conversion-error';
import {
  MappingDeclaration,
  inferMapping,
  isCompleteDeclaration,
  loadMappingFile,
  mappingFromDeclaration,
} from './mapping/mapping.resolver';
import {
  NormalizedRow,
  normalizeRowDetailed,
} from './normalizer/row-normalizer';
import { SourceReaderService } from './readers/source-reader.service';
import { UniversalWriterService } from './writers/universal-writer.service';

export const EXPORT_BASENAME = 'universal_readings';

/**
 * Options of a one-shot file job.
 */
export interface FileJobOptions {
  inputPath: string;
  outputPath: string;
  /** Format tag; defaults to the input file extension. */
  format?: string;
  /** JSON mapping declaration; the mapping is inferred when absent. */
  mappingPath?: string;
  sourceName?: string;
}

/**
 * File job summary. On success both counts are equal.
 */
export interface ConversionResult {
  rowsRead: number;
  rowsWritten: number;
  outputPath: string;
  mapping: FieldMapping;
}

export interface ConvertPayload {
  filename: string;
  /** File bytes, base64 encoded */
  content: string;
  sourceName?: string;
  mapping?: MappingDeclaration | null;
}

interface SourceTable {
  headers: readonly string[];
  rows: RawRow[];
}

export type ConvertResponse =
  | { rows: UniversalRow[]; count: number; detected_mapping: FieldMapping }
  | { error: string };

export interface ExportPayload {
  rows: readonly UniversalRow[];
  format: string;
}

export type ExportResponse =
  | { filename: string; content: string }
  | { error: string };

/**
 * ConversionService - runs conversion jobs end to end.
 *
 * Pipeline per job:
 * 1. Format: explicit tag or file extension
 * 2. Read: every raw row is collected before normalization starts
 * 3. Mapping: explicit declaration, or inferred from the source's header row
 * 4. Normalize: all-or-nothing, the first bad row aborts the job
 * 5. Write: one call producing the whole output
 *
 * The service keeps no state between jobs.
 */
@Injectable()
export class ConversionService {
  private readonly logger = new Logger(ConversionService.name);

  constructor(
    private readonly sourceReader: SourceReaderService,
    private readonly writer: UniversalWriterService,
    private readonly configService: ConfigService,
  ) {}

  private get defaultSourceName(): string {
    return this.configService.get<string>('DEFAULT_SOURCE_NAME', 'unknown');
  }

  /**
   * Convert a file on disk. The output file is only written once every row
   * has normalized.
   *
   * @throws ConversionError for mapping, format, shape and row failures
   */
  async convertFile(options: FileJobOptions): Promise<ConversionResult> {
    const startTime = Date.now();
    const format =
      options.format ?? this.sourceReader.detectFormat(options.inputPath);
    const target = this.writer.outputTargetFor(options.outputPath);

    const declaration = options.mappingPath
      ? await loadMappingFile(options.mappingPath)
      : undefined;

    const buffer = await readFile(options.inputPath);
    const { headers, rows: rawRows } = await this.collect(buffer, format);

    const mapping = declaration
      ? mappingFromDeclaration(declaration)
      : inferMapping(headers);

    const rows = this.normalizeAll(
      rawRows,
      mapping,
      options.sourceName ?? this.defaultSourceName,
    );

    await writeFile(options.outputPath, await this.writer.write(rows, target));

    this.logger.log(
      `Converted ${options.inputPath} -> ${options.outputPath}: ${rows.length}/${rawRows.length} rows in ${Date.now() - startTime}ms`,
    );

    return {
      rowsRead: rawRows.length,
      rowsWritten: rows.length,
      outputPath: options.outputPath,
      mapping,
    };
  }

  /**
   * Convert an uploaded file held in memory.
   *
   * The explicit mapping is used only when it declares the four required
   * columns; anything less falls back to inference.
   */
  async convertPayload(payload: ConvertPayload): Promise<ConvertResponse> {
    try {
      const format = this.sourceReader.detectFormat(payload.filename);
      const buffer = Buffer.from(payload.content, 'base64');
      const { headers, rows: rawRows } = await this.collect(buffer, format);

      const mapping = isCompleteDeclaration(payload.mapping)
        ? mappingFromDeclaration(payload.mapping)
        : inferMapping(headers);

      const rows = this.normalizeAll(
        rawRows,
        mapping,
        payload.sourceName?.trim() || this.defaultSourceName,
      );

      this.logger.log(
        `Converted upload ${payload.filename}: ${rows.length} rows (${format})`,
      );
      return { rows, count: rows.length, detected_mapping: mapping };
    } catch (error) {
      return this.toErrorResponse(error, `convert ${payload.filename}`);
    }
  }

  /**
   * Serialize rows for download as `universal_readings.<format>`, base64
   * encoded.
   */
  async exportRows(payload: ExportPayload): Promise<ExportResponse> {
    try {
      const extension = payload.format.trim().toLowerCase().replace(/^\./, '');
      const target = this.writer.outputTargetFor(extension);
      const bytes = await this.writer.write(payload.rows, target);

      this.logger.log(
        `Exported ${payload.rows.length} rows as ${extension} (${bytes.length} bytes)`,
      );
      return {
        filename: `${EXPORT_BASENAME}.${extension}`,
        content: bytes.toString('base64'),
      };
    } catch (error) {
      return this.toErrorResponse(error, 'export');
    }
  }

  /**
   * Read every raw row, keeping the header row the reader reported. A source
   * with headers but no data rows still yields its headers.
   */
  private async collect(buffer: Buffer, format: string): Promise<SourceTable> {
    let headers: readonly string[] = [];
    const rows: RawRow[] = [];
    const source = this.sourceReader.read(buffer, format, (observed) => {
      headers = observed;
    });
    for await (const row of source) {
      rows.push(row);
    }
    return { headers, rows };
  }

  /**
   * @throws ValidationError carrying the 1-based number of the first bad row
   */
  private normalizeAll(
    rawRows: readonly RawRow[],
    mapping: FieldMapping,
    sourceName: string,
  ): UniversalRow[] {
    const rows: UniversalRow[] = [];
    let fallbackWarned = false;

    rawRows.forEach((raw, index) => {
      const result = this.normalizeAt(raw, index + 1, mapping, sourceName);
      if (!fallbackWarned && result.datePattern !== mapping.date_format) {
        this.logger.warn(
          `Dates do not all match ${mapping.date_format}; row ${index + 1} parsed with ${result.datePattern}`,
        );
        fallbackWarned = true;
      }
      rows.push(result.row);
    });

    return rows;
  }

  private normalizeAt(
    raw: RawRow,
    rowNumber: number,
    mapping: FieldMapping,
    sourceName: string,
  ): NormalizedRow {
    try {
      return normalizeRowDetailed(raw, mapping, sourceName);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error.atRow(rowNumber);
      }
      throw error;
    }
  }

  private toErrorResponse(error: unknown, context: string): { error: string } {
    if (isConversionError(error)) {
      this.logger.warn(`Failed to ${context}: ${error.message}`);
      return { error: error.message };
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Unexpected failure to ${context}: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return { error: message };
  }
}
