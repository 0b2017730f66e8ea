import { parse } from 'csv-parse/sync';
import type { CsvOptions } from '../config/csvOptions';
import { digitCount, parseDecimalText } from '../parsers/decimal';
import { createParseOptions, toTokenRecords } from '../parsers/csvRecordParser';
import { typeToSQL } from '../parsers/schemaDDL';
import {
  INTEGRAL_RANGES,
  parseBoolean,
  parseFloating,
  parseIntegral,
  parseLong,
  parseTimestampFields,
} from '../parsers/valueConverters';
import type { SchemaInferenceEvaluator } from '../types/csv';
import {
  BooleanType,
  DateType,
  decimalType,
  DoubleType,
  IntegerType,
  LongType,
  MAX_DECIMAL_PRECISION,
  NullType,
  StringType,
  structField,
  structType,
  TimestampType,
} from '../types/schema';
import type { DataType, StructType } from '../types/schema';

/**
 * Infers a schema from the first record of a sample. Fields are named `_c0`, `_c1`, ...
 * and each token is typed by the narrowest type that reads it.
 */
export class SchemaOfCsvEvaluator implements SchemaInferenceEvaluator {
  constructor(private readonly options: CsvOptions) {}

  evaluate(sample: string): string {
    return typeToSQL(this.inferSchema(sample));
  }

  inferSchema(sample: string): StructType {
    const [tokens = []] = toTokenRecords(parse(sample, { ...createParseOptions(this.options), to: 1 }));
    return structType(
      tokens.map((token, i) => {
        const inferred = this.inferToken(token);
        return structField(`_c${i}`, inferred.kind === 'null' ? StringType : inferred);
      }),
    );
  }

  /**
   * Widening chain: INT, BIGINT, DECIMAL, DOUBLE, DATE, TIMESTAMP, BOOLEAN, STRING.
   */
  inferToken(token: string): DataType {
    const options = this.options;
    if (token === options.nullValue) return NullType;

    const [min, max] = INTEGRAL_RANGES.integer;
    if (parseIntegral(token, min, max) !== null) return IntegerType;
    if (parseLong(token) !== null) return LongType;

    const decimal = this.inferDecimal(token);
    if (decimal) return decimal;
    if (parseFloating(token, options) !== null) return DoubleType;

    if (options.preferDate && options.dateFormat.parse(token.trim()) !== null) return DateType;
    if (parseTimestampFields(token, options) !== null) return TimestampType;
    if (parseBoolean(token) !== null) return BooleanType;
    return StringType;
  }

  /**
   * Integral text beyond BIGINT reads as DECIMAL(n, 0); fractional text only when
   * `prefersDecimal` is set. Exponent notation is left to DOUBLE.
   */
  private inferDecimal(token: string): DataType | undefined {
    if (/[eE]/.test(token)) return undefined;
    const parsed = parseDecimalText(token);
    if (!parsed) return undefined;
    if (parsed.scale > 0 && !this.options.prefersDecimal) return undefined;

    const scale = parsed.scale;
    const precision = Math.max(digitCount(parsed.unscaled), scale);
    if (precision > MAX_DECIMAL_PRECISION) return undefined;
    return decimalType(precision, scale);
  }
}
