import { Injectable, Logger } from '@nestjs/common';
import { XMLParser } from 'fast-xml-parser';
import JSZip from 'jszip';
import { FormatError } from '../interfaces/conversion-error';
import {
  RawRow,
  UNIVERSAL_FIELDS,
  UniversalRow,
  toRecordValues,
} from '../dto/universal-row.dto';
import {
  MAX_COLUMNS,
  cellReference,
  columnLetters,
  columnOfReference,
} from './column-ref';
import {
  CONTENT_TYPES_XML,
  ROOT_RELS_XML,
  STYLES_XML,
  WORKBOOK_RELS_XML,
  WORKBOOK_XML,
  WORKSHEET_PATH,
  worksheetXml,
} from './package-parts';
import { cellText, classifyCell, richText } from './sheet-cell';
import { attribute, child, children, escapeXml } from './xml-node';

const WORKBOOK_PATH = 'xl/workbook.xml';
const WORKBOOK_RELS_PATH = 'xl/_rels/workbook.xml.rels';
const DEFAULT_SHARED_STRINGS_PATH = 'xl/sharedStrings.xml';
const WORKSHEET_PART = /^xl\/worksheets\/[^/]+\.xml$/i;

// Zip entries carry a modification time; pin it so identical rows give
// identical bytes.
const ENTRY_DATE = new Date('2000-01-01T00:00:00Z');

const ALWAYS_ARRAY = new Set(['si', 'row', 'c', 'sheet', 'Relationship']);

interface PackageLayout {
  worksheetPath: string;
  sharedStringsPath: string;
}

/**
 * Spreadsheet Codec
 *
 * Reads and writes single-sheet workbooks directly against the package:
 * jszip for the ZIP container, fast-xml-parser for the XML parts.
 *
 * Reading keeps every cell as text. Shared strings are resolved, inline
 * strings and literal values (numbers, booleans, cached formula results,
 * error codes) are passed through verbatim. The first row supplies the
 * column names of every later row.
 *
 * Writing emits every cell as an inline string, so no shared string table
 * is produced and the output re-reads to exactly the input values.
 */
@Injectable()
export class SpreadsheetCodec {
  private readonly logger = new Logger(SpreadsheetCodec.name);

  private readonly parserOptions = {
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true,
    isArray: (
      name: string,
      jpath: string,
      _isLeafNode: boolean,
      isAttribute: boolean,
    ) =>
      !isAttribute &&
      (ALWAYS_ARRAY.has(name) ||
        (name === 'r' && (jpath.endsWith('si.r') || jpath.endsWith('is.r')))),
  };

  /**
   * Decode the first worksheet into rows keyed by the header row.
   *
   * @throws FormatError when the archive or one of its XML parts is unreadable,
   *   when it holds no worksheet, or when a cell lies past column XFD
   */
  async *decode(
    archive: Buffer,
    onHeaders?: (headers: readonly string[]) => void,
  ): AsyncGenerator<RawRow> {
    const zip = await this.openArchive(archive);
    const layout = await this.locateParts(zip);

    const sharedXml = await this.readPart(zip, layout.sharedStringsPath);
    const sharedStrings =
      sharedXml === null ? [] : this.parseSharedStrings(sharedXml);

    const sheetXml = await this.readPart(zip, layout.worksheetPath);
    if (sheetXml === null) {
      throw new FormatError(
        `Worksheet part ${layout.worksheetPath} is missing from the archive`,
      );
    }

    const matrix = this.buildMatrix(sheetXml, sharedStrings);
    if (matrix.length === 0) return;

    const headers = matrix[0].map((header) => header.trim());
    onHeaders?.(headers);
    let yielded = 0;
    for (const cells of matrix.slice(1)) {
      if (cells.every((value) => value.trim() === '')) continue;

      const row: RawRow = {};
      headers.forEach((header, column) => {
        row[header] = cells[column] ?? '';
      });
      yielded++;
      yield row;
    }

    this.logger.debug(
      `Decoded ${yielded} rows from ${layout.worksheetPath} (${headers.length} columns)`,
    );
  }

  /**
   * Encode universal rows as a workbook whose header row holds the universal
   * field names. The same rows always give the same bytes.
   */
  async encode(rows: readonly UniversalRow[]): Promise<Buffer> {
    const matrix: string[][] = [
      [...UNIVERSAL_FIELDS],
      ...rows.map(toRecordValues),
    ];

    const sheetData = matrix
      .map((cells, rowIndex) => {
        const rowNumber = rowIndex + 1;
        const xmlCells = cells
          .map((value, column) =>
            this.inlineCell(cellReference(column + 1, rowNumber), value),
          )
          .join('');
        return `<row r="${rowNumber}">${xmlCells}</row>`;
      })
      .join('');

    const zip = new JSZip();
    const parts: Array<[string, string]> = [
      ['[Content_Types].xml', CONTENT_TYPES_XML],
      ['_rels/.rels', ROOT_RELS_XML],
      [WORKBOOK_PATH, WORKBOOK_XML],
      [WORKBOOK_RELS_PATH, WORKBOOK_RELS_XML],
      [WORKSHEET_PATH, worksheetXml(sheetData)],
      ['xl/styles.xml', STYLES_XML],
    ];
    for (const [path, content] of parts) {
      zip.file(path, content, { date: ENTRY_DATE, createFolders: false });
    }

    return zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }

  private inlineCell(reference: string, value: string): string {
    const preserve = value !== value.trim() ? ' xml:space="preserve"' : '';
    return `<c r="${reference}" t="inlineStr"><is><t${preserve}>${escapeXml(value)}</t></is></c>`;
  }

  private async openArchive(archive: Buffer): Promise<JSZip> {
    try {
      return await JSZip.loadAsync(archive);
    } catch (error) {
      throw new FormatError(
        `Malformed spreadsheet archive: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async readPart(zip: JSZip, path: string): Promise<string | null> {
    const entry = zip.file(path);
    if (!entry) return null;
    try {
      return await entry.async('string');
    } catch (error) {
      throw new FormatError(
        `Cannot read ${path} from the archive: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private parseXml(xml: string, path: string): unknown {
    const parser = new XMLParser(this.parserOptions);
    try {
      return parser.parse(xml, true);
    } catch (error) {
      throw new FormatError(
        `Invalid XML in ${path}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Resolve the first sheet and the shared string table through the workbook
   * relationships, falling back to conventional part names.
   */
  private async locateParts(zip: JSZip): Promise<PackageLayout> {
    const targets = new Map<string, string>();
    let sharedStringsPath = DEFAULT_SHARED_STRINGS_PATH;

    const relsXml = await this.readPart(zip, WORKBOOK_RELS_PATH);
    if (relsXml !== null) {
      const rels = this.parseXml(relsXml, WORKBOOK_RELS_PATH);
      for (const rel of children(child(rels, 'Relationships'), 'Relationship')) {
        const id = attribute(rel, 'Id');
        const target = attribute(rel, 'Target');
        const type = attribute(rel, 'Type') ?? '';
        if (!id || !target) continue;

        const path = this.resolveTarget(target);
        targets.set(id, path);
        if (type.endsWith('/sharedStrings')) sharedStringsPath = path;
      }
    }

    let worksheetPath: string | undefined;
    const workbookXml = await this.readPart(zip, WORKBOOK_PATH);
    if (workbookXml !== null) {
      const workbook = this.parseXml(workbookXml, WORKBOOK_PATH);
      const sheets = children(child(child(workbook, 'workbook'), 'sheets'), 'sheet');
      const relId = sheets.length > 0 ? attribute(sheets[0], 'id') : undefined;
      const target = relId === undefined ? undefined : targets.get(relId);
      if (target !== undefined && zip.file(target)) worksheetPath = target;
    }

    if (worksheetPath === undefined) {
      worksheetPath = Object.keys(zip.files)
        .filter((name) => WORKSHEET_PART.test(name) && !zip.files[name].dir)
        .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }))[0];
    }
    if (worksheetPath === undefined) {
      throw new FormatError('Spreadsheet archive contains no worksheet');
    }

    return { worksheetPath, sharedStringsPath };
  }

  /** Relationship targets are relative to xl/ unless rooted. */
  private resolveTarget(target: string): string {
    if (target.startsWith('/')) return target.slice(1);
    const segments = ['xl'];
    for (const segment of target.split('/')) {
      if (segment === '..') segments.pop();
      else if (segment !== '.' && segment !== '') segments.push(segment);
    }
    return segments.join('/');
  }

  private parseSharedStrings(xml: string): string[] {
    const parsed = this.parseXml(xml, 'shared strings');
    return children(child(parsed, 'sst'), 'si').map(richText);
  }

  /**
   * Dense text matrix of the sheet: each row as long as its right-most cell,
   * gaps filled with empty strings.
   */
  private buildMatrix(xml: string, sharedStrings: readonly string[]): string[][] {
    const parsed = this.parseXml(xml, 'worksheet');
    const sheetData = child(child(parsed, 'worksheet'), 'sheetData');

    return children(sheetData, 'row').map((rowNode) => {
      const values = new Map<number, string>();
      let column = 0;
      for (const cellNode of children(rowNode, 'c')) {
        const reference = attribute(cellNode, 'r');
        column =
          (reference === undefined ? null : columnOfReference(reference)) ??
          column + 1;
        if (column > MAX_COLUMNS) {
          throw new FormatError(
            `Cell ${reference ?? `#${column}`} lies beyond the last worksheet column (${columnLetters(MAX_COLUMNS)})`,
          );
        }
        values.set(column, cellText(classifyCell(cellNode), sharedStrings));
      }

      const width = Math.max(0, ...values.keys());
      return Array.from({ length: width }, (_, index) => values.get(index + 1) ?? '');
    });
  }
}
