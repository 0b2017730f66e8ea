import { ConfigurationError, FieldParseError } from '../errors';
import type { CsvOptions } from '../config/csvOptions';
import type { Value } from '../types/record';
import type { DataType } from '../types/schema';
import { toDecimal } from './decimal';
import { parseIsoDate, parseIsoTimestamp, utcEpochMillis } from './dateTimePattern';
import type { DateTimeFields, ZoneClock } from './dateTimePattern';
import { typeToSQL } from './schemaDDL';

/**
 * Converts one non-null token to the value of its field.
 * @throws FieldParseError when the token does not fit the type
 */
export type ValueConverter = (token: string) => Value;

const INTEGRAL_REGEX = /^[+-]?\d+$/;
const FLOATING_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

export const INTEGRAL_RANGES = {
  byte: [-128, 127],
  short: [-32768, 32767],
  integer: [-2147483648, 2147483647],
} as const;

export function parseIntegral(text: string, min: number, max: number): number | null {
  const trimmed = text.trim();
  if (!INTEGRAL_REGEX.test(trimmed)) return null;
  const value = Number(trimmed);
  return value >= min && value <= max ? value : null;
}

export function parseLong(text: string): bigint | null {
  const trimmed = text.trim();
  if (!INTEGRAL_REGEX.test(trimmed)) return null;
  const value = BigInt(trimmed);
  return value >= LONG_MIN && value <= LONG_MAX ? value : null;
}

/**
 * Floating-point text, including the configured NaN/infinity spellings.
 */
export function parseFloating(text: string, options: CsvOptions): number | null {
  const trimmed = text.trim();
  if (trimmed === options.nanValue || trimmed === 'NaN') return Number.NaN;
  if (trimmed === options.positiveInf || trimmed === 'Infinity' || trimmed === '+Infinity') {
    return Number.POSITIVE_INFINITY;
  }
  if (trimmed === options.negativeInf || trimmed === '-Infinity') return Number.NEGATIVE_INFINITY;
  if (!FLOATING_REGEX.test(trimmed)) return null;
  return Number(trimmed);
}

export function parseBoolean(text: string): boolean | null {
  const lower = text.trim().toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return null;
}

/**
 * Date fields of a token: strict when `dateFormat` was given, otherwise the default
 * pattern first and then lenient ISO-8601.
 */
export function parseDateFields(text: string, options: CsvOptions): DateTimeFields | null {
  const trimmed = text.trim();
  const strict = options.dateFormat.parse(trimmed);
  if (strict || options.dateFormatExplicit) return strict;
  return parseIsoDate(trimmed);
}

export function parseTimestampFields(text: string, options: CsvOptions): DateTimeFields | null {
  const trimmed = text.trim();
  return options.timestampFormat ? options.timestampFormat.parse(trimmed) : parseIsoTimestamp(trimmed);
}

function required<T>(value: T | null, dataType: DataType, token: string): T {
  if (value === null) throw new FieldParseError(typeToSQL(dataType), token);
  return value;
}

/**
 * Builds the converter for one field type. Only atomic types (and user-defined types
 * over them) have a CSV text form.
 */
export function makeValueConverter(
  dataType: DataType,
  options: CsvOptions,
  clock: ZoneClock,
): ValueConverter {
  switch (dataType.kind) {
    case 'null':
      return () => null;
    case 'string':
      return (token) => token;
    case 'boolean':
      return (token) => required(parseBoolean(token), dataType, token);
    case 'byte':
    case 'short':
    case 'integer': {
      const [min, max] = INTEGRAL_RANGES[dataType.kind];
      return (token) => required(parseIntegral(token, min, max), dataType, token);
    }
    case 'long':
      return (token) => required(parseLong(token), dataType, token);
    case 'float':
      return (token) => Math.fround(required(parseFloating(token, options), dataType, token));
    case 'double':
      return (token) => required(parseFloating(token, options), dataType, token);
    case 'decimal': {
      const { precision, scale } = dataType;
      return (token) => required(toDecimal(token, precision, scale), dataType, token);
    }
    case 'binary': {
      const encoder = new TextEncoder();
      return (token) => encoder.encode(token);
    }
    case 'date':
      return (token) => {
        const fields = required(parseDateFields(token, options), dataType, token);
        return new Date(
          utcEpochMillis({ ...fields, hour: 0, minute: 0, second: 0, millisecond: 0, offsetMinutes: undefined }),
        );
      };
    case 'timestamp':
      return (token) => {
        const fields = required(parseTimestampFields(token, options), dataType, token);
        return new Date(clock.toEpochMillis(fields));
      };
    case 'timestamp_ntz':
      return (token) => {
        const trimmed = token.trim();
        const fields = options.timestampNTZFormat
          ? options.timestampNTZFormat.parse(trimmed)
          : parseIsoTimestamp(trimmed);
        // a wall clock carries no zone
        if (fields === null || fields.offsetMinutes !== undefined) {
          throw new FieldParseError(typeToSQL(dataType), token);
        }
        return new Date(utcEpochMillis(fields));
      };
    case 'udt':
      return makeValueConverter(dataType.sqlType, options, clock);
    case 'array':
    case 'map':
    case 'struct':
    case 'variant':
      throw new ConfigurationError(
        'UNSUPPORTED_DATA_TYPE',
        `CSV data source does not support ${typeToSQL(dataType)} data type.`,
        { dataType: typeToSQL(dataType) },
      );
  }
}
