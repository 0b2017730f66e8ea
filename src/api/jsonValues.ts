/**
 * JSON <-> Value conversion for the HTTP surface. Every conversion is driven by the
 * field's data type.
 *
 * - long: a JSON number when it is a safe integer, a string otherwise
 * - decimal: a string in plain notation
 * - NaN and infinities: the strings `NaN`, `Infinity`, `-Infinity`
 * - binary: base64
 * - date: `yyyy-MM-dd`; timestamp: ISO-8601 in UTC; timestamp_ntz: ISO-8601 without zone
 * - map: a JSON object keyed by the rendered key
 * - struct: a JSON object keyed by field name
 */

import { InvalidInputError } from '../errors';
import { toDecimal } from '../parsers/decimal';
import { parseIsoDate, parseIsoTimestamp, utcEpochMillis } from '../parsers/dateTimePattern';
import { typeToSQL } from '../parsers/schemaDDL';
import { INTEGRAL_RANGES, parseLong } from '../parsers/valueConverters';
import { isMapData, isValueArray, mapData } from '../types/record';
import type { Row, Value } from '../types/record';
import type { DataType, StructType } from '../types/schema';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberToJson(value: number): JsonValue {
  return Number.isFinite(value) ? value : String(value);
}

export function valueToJson(value: Value, dataType: DataType): JsonValue {
  if (value === null) return null;
  switch (dataType.kind) {
    case 'long': {
      const asNumber = Number(value);
      return Number.isSafeInteger(asNumber) ? asNumber : String(value);
    }
    case 'date':
      return value instanceof Date ? value.toISOString().slice(0, 10) : String(value);
    case 'timestamp':
      return value instanceof Date ? value.toISOString() : String(value);
    case 'timestamp_ntz':
      return value instanceof Date ? value.toISOString().slice(0, -1) : String(value);
    case 'binary':
      return value instanceof Uint8Array ? Buffer.from(value).toString('base64') : String(value);
    case 'array': {
      const { elementType } = dataType;
      return isValueArray(value) ? value.map((v) => valueToJson(v, elementType)) : null;
    }
    case 'map': {
      if (!isMapData(value)) return null;
      const object: { [key: string]: JsonValue } = {};
      value.keys.forEach((key, i) => {
        object[String(valueToJson(key, dataType.keyType))] = valueToJson(value.values[i] ?? null, dataType.valueType);
      });
      return object;
    }
    case 'struct':
      return isValueArray(value) ? rowToJson(value, dataType) : null;
    case 'udt':
      return valueToJson(value, dataType.sqlType);
    default:
      if (typeof value === 'number') return numberToJson(value);
      if (typeof value === 'boolean' || typeof value === 'string') return value;
      return String(value);
  }
}

export function rowToJson(row: Row, schema: StructType): { [key: string]: JsonValue } {
  const object: { [key: string]: JsonValue } = {};
  schema.fields.forEach((field, i) => {
    object[field.name] = valueToJson(row[i] ?? null, field.dataType);
  });
  return object;
}

function mismatch(path: string, dataType: DataType, json: unknown): InvalidInputError {
  return new InvalidInputError(path, `expected ${typeToSQL(dataType)}, got ${JSON.stringify(json)}`);
}

function floatingFromJson(json: unknown): number | undefined {
  if (typeof json === 'number') return json;
  if (json === 'NaN') return Number.NaN;
  if (json === 'Infinity') return Number.POSITIVE_INFINITY;
  if (json === '-Infinity') return Number.NEGATIVE_INFINITY;
  return undefined;
}

function mapKeyFromJson(key: string, keyType: DataType): unknown {
  switch (keyType.kind) {
    case 'byte':
    case 'short':
    case 'integer':
    case 'float':
    case 'double':
      return Number(key);
    case 'boolean':
      return key === 'true' ? true : key === 'false' ? false : key;
    default:
      return key;
  }
}

/**
 * @throws InvalidInputError when the JSON does not fit the type
 */
export function jsonToValue(json: unknown, dataType: DataType, path = '$'): Value {
  if (json === null || json === undefined) return null;
  switch (dataType.kind) {
    case 'null':
      throw mismatch(path, dataType, json);
    case 'boolean':
      if (typeof json === 'boolean') return json;
      throw mismatch(path, dataType, json);
    case 'byte':
    case 'short':
    case 'integer': {
      const [min, max] = INTEGRAL_RANGES[dataType.kind];
      if (typeof json === 'number' && Number.isInteger(json) && json >= min && json <= max) return json;
      throw mismatch(path, dataType, json);
    }
    case 'long': {
      const value =
        typeof json === 'number' && Number.isSafeInteger(json)
          ? BigInt(json)
          : typeof json === 'string'
            ? parseLong(json)
            : null;
      if (value === null) throw mismatch(path, dataType, json);
      return value;
    }
    case 'float':
    case 'double': {
      const value = floatingFromJson(json);
      if (value === undefined) throw mismatch(path, dataType, json);
      return dataType.kind === 'float' ? Math.fround(value) : value;
    }
    case 'decimal': {
      const value =
        typeof json === 'number' || typeof json === 'string'
          ? toDecimal(String(json), dataType.precision, dataType.scale)
          : null;
      if (value === null) throw mismatch(path, dataType, json);
      return value;
    }
    case 'string':
      if (typeof json === 'string') return json;
      throw mismatch(path, dataType, json);
    case 'binary':
      if (typeof json === 'string') return new Uint8Array(Buffer.from(json, 'base64'));
      throw mismatch(path, dataType, json);
    case 'date': {
      const fields = typeof json === 'string' ? parseIsoDate(json) : null;
      if (!fields) throw mismatch(path, dataType, json);
      return new Date(utcEpochMillis(fields));
    }
    case 'timestamp':
    case 'timestamp_ntz': {
      const fields = typeof json === 'string' ? parseIsoTimestamp(json) : null;
      if (!fields) throw mismatch(path, dataType, json);
      return new Date(utcEpochMillis(fields) - (fields.offsetMinutes ?? 0) * 60_000);
    }
    case 'array': {
      if (!Array.isArray(json)) throw mismatch(path, dataType, json);
      const { elementType } = dataType;
      return json.map((item: unknown, i) => jsonToValue(item, elementType, `${path}[${i}]`));
    }
    case 'map': {
      if (!isJsonObject(json)) throw mismatch(path, dataType, json);
      const { keyType, valueType } = dataType;
      return mapData(
        Object.entries(json).map(([key, item]): [Value, Value] => [
          jsonToValue(mapKeyFromJson(key, keyType), keyType, `${path}.${key}`),
          jsonToValue(item, valueType, `${path}.${key}`),
        ]),
      );
    }
    case 'struct':
      return jsonToRow(json, dataType, path);
    case 'udt':
      return jsonToValue(json, dataType.sqlType, path);
    case 'variant':
      throw new InvalidInputError(path, 'VARIANT values are not accepted');
  }
}

/**
 * A struct from a JSON object (by field name) or a JSON array (by position).
 */
export function jsonToRow(json: unknown, schema: StructType, path = '$'): Row {
  if (Array.isArray(json)) {
    return schema.fields.map((field, i): Value => jsonToValue(json[i], field.dataType, `${path}[${i}]`));
  }
  if (isJsonObject(json)) {
    return schema.fields.map((field): Value => jsonToValue(json[field.name], field.dataType, `${path}.${field.name}`));
  }
  throw mismatch(path, schema, json);
}
