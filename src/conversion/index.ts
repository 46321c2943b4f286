// Re-export public API
export { ConversionModule } from './conversion.module';
export { ConversionService, EXPORT_BASENAME } from './conversion.service';
export type {
  ConversionResult,
  ConvertPayload,
  ConvertResponse,
  ExportPayload,
  ExportResponse,
  FileJobOptions,
} from './conversion.service';
export { UNIVERSAL_FIELDS } from './dto/universal-row.dto';
export type { RawRow, UniversalRow } from './dto/universal-row.dto';
export type { FieldMapping } from './dto/field-mapping.dto';
export {
  ConversionError,
  FormatError,
  MappingError,
  ShapeError,
  ValidationError,
  isConversionError,
} from './interfaces/conversion-error';
export { resolveMapping } from './mapping/mapping.resolver';
export { normalizeRow } from './normalizer/row-normalizer';
