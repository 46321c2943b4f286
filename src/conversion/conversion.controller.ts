import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { FieldMapping } from './dto/field-mapping.dto';
import {
  ConvertRequestDto,
  convertRequestSchema,
} from './dto/convert-request.dto';
import { ExportRequestDto, exportRequestSchema } from './dto/export-request.dto';
import { UniversalRow } from './dto/universal-row.dto';
import { ConversionService } from './conversion.service';
import { ZodBodyPipe } from './pipes/zod-body.pipe';

export interface ConvertResponseBody {
  rows: UniversalRow[];
  count: number;
  detected_mapping: FieldMapping;
}

export interface ExportResponseBody {
  filename: string;
  /** base64 */
  content: string;
}

/**
 * ConversionController
 *
 * JSON API over the in-memory jobs. Every failure answers 400 with a body of
 * `{ error }`.
 *
 * Usage:
 *   POST /api/convert  { filename, content (base64), source_name?, mapping? }
 *   POST /api/export   { rows, format }
 */
@Controller('api')
export class ConversionController {
  private readonly logger = new Logger(ConversionController.name);

  constructor(private readonly conversionService: ConversionService) {}

  @Post('convert')
  @HttpCode(HttpStatus.OK)
  async convert(
    @Body(new ZodBodyPipe(convertRequestSchema)) body: ConvertRequestDto,
  ): Promise<ConvertResponseBody> {
    this.logger.log(
      `Convert request: ${body.filename} (${body.content.length} base64 chars)`,
    );

    const result = await this.conversionService.convertPayload({
      filename: body.filename,
      content: body.content,
      sourceName: body.source_name,
      mapping: body.mapping,
    });
    if ('error' in result) {
      throw new BadRequestException({ error: result.error });
    }
    return result;
  }

  @Post('export')
  @HttpCode(HttpStatus.OK)
  async exportRows(
    @Body(new ZodBodyPipe(exportRequestSchema)) body: ExportRequestDto,
  ): Promise<ExportResponseBody> {
    this.logger.log(`Export request: ${body.rows.length} rows as ${body.format}`);

    const result = await this.conversionService.exportRows(body);
    if ('error' in result) {
      throw new BadRequestException({ error: result.error });
    }
    return result;
  }
}
