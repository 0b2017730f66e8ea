export * from './types/schema';
export * from './types/record';
export * from './types/csv';
export * from './errors';

export { codecConfig, defaultSessionConf, loadCodecConfig } from './config/codecConfig';
export type { CodecConfig, SessionConf } from './config/codecConfig';
export {
  CsvOptions,
  DEFAULT_DATE_FORMAT,
  DEFAULT_TIMESTAMP_NTZ_WRITE_FORMAT,
  DEFAULT_TIMESTAMP_WRITE_FORMAT,
  SINGLE_RECORD_LINE_SEP,
} from './config/csvOptions';

export { DateTimePattern, ZoneClock } from './parsers/dateTimePattern';
export type { DateTimeFields } from './parsers/dateTimePattern';
export { parseDataType, parseSchemaDDL, schemaToDDL, typeToSQL } from './parsers/schemaDDL';
export { CsvRecordParser } from './parsers/csvRecordParser';
export { FailureSafeParser } from './parsers/failureSafeParser';
export { CsvRecordWriter } from './writers/csvRecordWriter';

export { resolveSchemas } from './schema/schemaResolver';
export type { ResolvedSchemas, ResolveOptions } from './schema/schemaResolver';
export { isDecodableDataType, isSupportedDataType } from './schema/typeSupport';
export { SchemaOfCsvEvaluator } from './schema/schemaInference';

export {
  assertTypeCheck,
  BoundReference,
  compile,
  Literal,
} from './expressions/expression';
export type {
  CodeGenerable,
  CompiledExpression,
  Expression,
  SchemaBound,
  TimeZoneAware,
  TypeChecked,
  TypeCheckResult,
} from './expressions/expression';
export { LazySlot } from './expressions/lazySlot';
export { CsvToStructs } from './expressions/csvToStructs';
export type { CsvToStructsArgs } from './expressions/csvToStructs';
export { StructsToCsv } from './expressions/structsToCsv';
export type { StructsToCsvArgs } from './expressions/structsToCsv';
export { SchemaOfCsv } from './expressions/schemaOfCsv';
export type { SchemaOfCsvArgs } from './expressions/schemaOfCsv';
export { createFunction, fromCsv, schemaOfCsv, toCsv } from './expressions/functionRegistry';
export type { CsvFunctionName } from './expressions/functionRegistry';

export { PartitionRunner } from './engine/partitionRunner';
export { createApp } from './app';
