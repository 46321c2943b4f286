import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  FRENCH_MAPPING,
  SAMPLE_ROWS,
  UNIVERSAL_HEADER,
  frenchCsv,
  inferableCsv,
} from '../../test/utils/mock-data';
import { collectRows } from '../../test/utils/test-helpers';
import { ConversionService } from './conversion.service';
import { MappingError, ValidationError } from './interfaces/conversion-error';
import { DelimitedReader } from './readers/delimited.reader';
import { JsonReader } from './readers/json.reader';
import { SourceReaderService } from './readers/source-reader.service';
import { SpreadsheetReader } from './readers/spreadsheet.reader';
import { SpreadsheetCodec } from './spreadsheet/spreadsheet.codec';
import { UniversalWriterService } from './writers/universal-writer.service';

describe('ConversionService', () => {
  let service: ConversionService;
  let sourceReader: SourceReaderService;
  let codec: SpreadsheetCodec;

  const mockConfigService = {
    get: jest.fn((key: string, fallback?: unknown) =>
      key === 'DEFAULT_SOURCE_NAME' ? 'ops-import' : fallback,
    ),
  };

  const base64 = (lines: string[]) =>
    Buffer.from(lines.join('\n'), 'utf-8').toString('base64');

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConversionService,
        SourceReaderService,
        DelimitedReader,
        JsonReader,
        SpreadsheetReader,
        SpreadsheetCodec,
        UniversalWriterService,
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<ConversionService>(ConversionService);
    sourceReader = module.get<SourceReaderService>(SourceReaderService);
    codec = module.get<SpreadsheetCodec>(SpreadsheetCodec);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('convertPayload', () => {
    it('should apply a complete explicit mapping', async () => {
      const result = await service.convertPayload({
        filename: 'releves.csv',
        content: base64(frenchCsv.simple()),
        mapping: FRENCH_MAPPING,
      });

      expect(result).toEqual({
        rows: [
          {
            meter_id: 'M-1',
            customer_id: 'C-1',
            reading_value: '100.500',
            reading_date: '2026-01-01',
            unit: 'kWh',
            source_system: 'SYS_A',
          },
        ],
        count: 1,
        detected_mapping: FRENCH_MAPPING,
      });
    });

    it('should infer the mapping and default the source name from config', async () => {
      const result = await service.convertPayload({
        filename: 'export.csv',
        content: base64(inferableCsv),
      });

      expect(result).toEqual({
        rows: [
          {
            meter_id: 'M-7',
            customer_id: 'C-7',
            reading_value: '12.000',
            reading_date: '2026-04-03',
            unit: 'kWh',
            source_system: 'ops-import',
          },
        ],
        count: 1,
        detected_mapping: {
          meter_id: 'id_compteur',
          customer_id: 'id_client',
          reading_value: 'valeur_releve',
          reading_date: 'date_releve',
          unit: '',
          source_system: '',
          date_format: '%d/%m/%Y',
        },
      });
    });

    it('should prefer the requested source name', async () => {
      const result = await service.convertPayload({
        filename: 'export.csv',
        content: base64(inferableCsv),
        sourceName: 'billing',
      });

      expect('rows' in result && result.rows[0].source_system).toBe('billing');
    });

    it('should reject a declared date format it cannot parse', async () => {
      await expect(
        service.convertPayload({
          filename: 'releves.csv',
          content: base64(frenchCsv.simple()),
          mapping: { ...FRENCH_MAPPING, date_format: '%d/%m/%Y %p' },
        }),
      ).resolves.toEqual({
        error: 'Unsupported directive %p in date format "%d/%m/%Y %p"',
      });
    });

    it('should infer when the explicit mapping is incomplete', async () => {
      const result = await service.convertPayload({
        filename: 'releves.csv',
        content: base64(frenchCsv.simple()),
        mapping: { meter_id: 'Compteur' },
      });

      expect('detected_mapping' in result && result.detected_mapping).toEqual(
        FRENCH_MAPPING,
      );
    });

    it('should report the first invalid row', async () => {
      const result = await service.convertPayload({
        filename: 'releves.csv',
        content: base64(
          frenchCsv.rows(['M-1', '10', '01/01/2026'], ['M-2', 'abc', '02/01/2026']),
        ),
      });

      expect(result).toEqual({
        error: 'Row 2: reading_value is not a number: "abc"',
      });
    });

    it('should reject unsupported files', async () => {
      await expect(
        service.convertPayload({ filename: 'scan.pdf', content: '' }),
      ).resolves.toEqual({ error: 'Unsupported file extension: .pdf' });
    });

    it('should fail when the file has no header row', async () => {
      await expect(
        service.convertPayload({ filename: 'empty.csv', content: '' }),
      ).resolves.toEqual({
        error: 'Cannot infer a source column for "meter_id" from the file headers',
      });
    });

    it('should infer from the header row when no data row follows', async () => {
      await expect(
        service.convertPayload({
          filename: 'empty.csv',
          content: base64(['meter,customer']),
        }),
      ).resolves.toEqual({
        error:
          'Cannot infer a source column for "reading_value" from the file headers',
      });
    });

    it('should report JSON that is not list-shaped', async () => {
      await expect(
        service.convertPayload({
          filename: 'readings.json',
          content: base64(['42']),
        }),
      ).resolves.toEqual({
        error:
          'JSON content must be a list of rows or an object with a "readings" list',
      });
    });

    it('should surface unexpected failures as an error message', async () => {
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      jest.spyOn(sourceReader, 'detectFormat').mockImplementation(() => {
        throw new Error('disk unavailable');
      });

      await expect(
        service.convertPayload({ filename: 'a.csv', content: '' }),
      ).resolves.toEqual({ error: 'disk unavailable' });
    });

    it('should warn once when dates needed a fallback pattern', async () => {
      const warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);

      const result = await service.convertPayload({
        filename: 'releves.csv',
        content: base64(
          frenchCsv.rows(['M-1', '1', '2026-01-05'], ['M-2', '2', '2026-01-06']),
        ),
        mapping: FRENCH_MAPPING,
      });

      expect('count' in result && result.count).toBe(2);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        'Dates do not all match %d/%m/%Y; row 1 parsed with %Y-%m-%d',
      );
    });
  });

  describe('exportRows', () => {
    it('should export delimited text as base64', async () => {
      const result = await service.exportRows({ rows: SAMPLE_ROWS, format: 'csv' });

      expect(result).toEqual({
        filename: 'universal_readings.csv',
        content: expect.any(String) as string,
      });
      const text =
        'content' in result
          ? Buffer.from(result.content, 'base64').toString('utf-8')
          : '';
      expect(text.split('\n')[0]).toBe(UNIVERSAL_HEADER);
      expect(text.split('\n')[1]).toBe('M-1,C-1,100.500,2026-01-01,kWh,SYS_A');
    });

    it('should export a workbook for xlsx', async () => {
      const result = await service.exportRows({ rows: SAMPLE_ROWS, format: 'XLSX' });

      expect('filename' in result && result.filename).toBe(
        'universal_readings.xlsx',
      );
      const bytes =
        'content' in result ? Buffer.from(result.content, 'base64') : Buffer.alloc(0);
      await expect(collectRows(codec.decode(bytes))).resolves.toEqual(SAMPLE_ROWS);
    });

    it('should reject other formats', async () => {
      await expect(
        service.exportRows({ rows: SAMPLE_ROWS, format: 'pdf' }),
      ).resolves.toEqual({ error: 'Unsupported output format: pdf' });
    });
  });

  describe('convertFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'convert-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    const writeInput = async (name: string, lines: string[]) => {
      const path = join(dir, name);
      await writeFile(path, lines.join('\n'), 'utf-8');
      return path;
    };

    const writeMapping = async (declaration: object) => {
      const path = join(dir, 'mapping.json');
      await writeFile(path, JSON.stringify(declaration), 'utf-8');
      return path;
    };

    it('should convert a file with a mapping file', async () => {
      const inputPath = await writeInput('releves.csv', frenchCsv.simple());
      const outputPath = join(dir, 'out.csv');

      const result = await service.convertFile({
        inputPath,
        outputPath,
        mappingPath: await writeMapping(FRENCH_MAPPING),
        sourceName: 'unknown',
      });

      expect(result).toEqual({
        rowsRead: 1,
        rowsWritten: 1,
        outputPath,
        mapping: FRENCH_MAPPING,
      });
      await expect(readFile(outputPath, 'utf-8')).resolves.toBe(
        `${UNIVERSAL_HEADER}\nM-1,C-1,100.500,2026-01-01,kWh,SYS_A\n`,
      );
    });

    it('should honour an explicit format tag', async () => {
      const inputPath = await writeInput('releves.dat', frenchCsv.simple());
      const outputPath = join(dir, 'out.csv');

      const result = await service.convertFile({
        inputPath,
        outputPath,
        format: 'csv',
      });

      expect(result.rowsWritten).toBe(1);
      expect(result.mapping).toEqual(FRENCH_MAPPING);
    });

    it('should write nothing when a row fails', async () => {
      const inputPath = await writeInput(
        'releves.csv',
        frenchCsv.rows(['M-1', 'abc', '01/01/2026']),
      );
      const outputPath = join(dir, 'out.csv');

      const attempt = service.convertFile({ inputPath, outputPath });

      await expect(attempt).rejects.toThrow(ValidationError);
      await expect(attempt).rejects.toThrow(
        'Row 1: reading_value is not a number: "abc"',
      );
      expect(existsSync(outputPath)).toBe(false);
    });

    it('should reject an incomplete mapping file', async () => {
      const inputPath = await writeInput('releves.csv', frenchCsv.simple());

      const attempt = service.convertFile({
        inputPath,
        outputPath: join(dir, 'out.csv'),
        mappingPath: await writeMapping({
          meter_id: 'Compteur',
          customer_id: 'Client',
          reading_value: 'Valeur',
        }),
      });

      await expect(attempt).rejects.toThrow(MappingError);
      await expect(attempt).rejects.toThrow(
        'Missing field mapping for "reading_date"',
      );
    });

    it('should write a header-only file for a source without data rows', async () => {
      const inputPath = await writeInput('empty.csv', [
        'meter_id,customer_id,reading_value,reading_date',
        '',
      ]);
      const outputPath = join(dir, 'universal.csv');

      const result = await service.convertFile({ inputPath, outputPath });

      expect(result).toMatchObject({ rowsRead: 0, rowsWritten: 0 });
      expect(result.mapping).toMatchObject({
        meter_id: 'meter_id',
        reading_date: 'reading_date',
      });
      await expect(readFile(outputPath, 'utf-8')).resolves.toBe(
        `${UNIVERSAL_HEADER}\n`,
      );
    });

    it('should produce byte-identical output on re-runs', async () => {
      const inputPath = await writeInput('releves.csv', frenchCsv.simple());
      const first = join(dir, 'first.xlsx');
      const second = join(dir, 'second.xlsx');

      await service.convertFile({ inputPath, outputPath: first });
      await service.convertFile({ inputPath, outputPath: second });

      const [a, b] = await Promise.all([readFile(first), readFile(second)]);
      expect(a.equals(b)).toBe(true);
    });

    it('should reject an unsupported output extension before reading', async () => {
      const inputPath = await writeInput('releves.csv', frenchCsv.simple());

      await expect(
        service.convertFile({ inputPath, outputPath: join(dir, 'out.json') }),
      ).rejects.toThrow('Unsupported output format');
    });
  });
});
