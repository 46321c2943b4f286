import { Module } from '@nestjs/common';
import { ConversionController } from './conversion.controller';
import { ConversionService } from './conversion.service';
import { DelimitedReader } from './readers/delimited.reader';
import { JsonReader } from './readers/json.reader';
import { SourceReaderService } from './readers/source-reader.service';
import { SpreadsheetReader } from './readers/spreadsheet.reader';
import { SpreadsheetCodec } from './spreadsheet/spreadsheet.codec';
import { UniversalWriterService } from './writers/universal-writer.service';

/**
 * ConversionModule
 *
 * Components:
 * - ConversionController: JSON API for uploads and exports
 * - ConversionService: file job and in-memory jobs
 * - SourceReaderService: format tag -> reader strategy
 * - DelimitedReader / JsonReader / SpreadsheetReader: reader strategies
 * - SpreadsheetCodec: workbook package decode/encode
 * - UniversalWriterService: delimited and workbook output
 */
@Module({
  controllers: [ConversionController],
  providers: [
    ConversionService,
    SourceReaderService,
    DelimitedReader,
    JsonReader,
    SpreadsheetReader,
    SpreadsheetCodec,
    UniversalWriterService,
  ],
  exports: [ConversionService],
})
export class ConversionModule {}
