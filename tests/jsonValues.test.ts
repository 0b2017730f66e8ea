import { describe, expect, it } from 'vitest';
import { jsonToRow, jsonToValue, rowToJson, valueToJson } from '../src/api/jsonValues';
import { InvalidInputError } from '../src/errors';
import { parseSchemaDDL } from '../src/parsers/schemaDDL';
import { mapData } from '../src/types/record';
import {
  BinaryType,
  ByteType,
  DateType,
  decimalType,
  DoubleType,
  IntegerType,
  LongType,
  mapType,
  StringType,
  TimestampNTZType,
  TimestampType,
} from '../src/types/schema';

describe('valueToJson', () => {
  it('renders longs as numbers while they are safe', () => {
    expect(valueToJson(42n, LongType)).toBe(42);
    expect(valueToJson(9007199254740993n, LongType)).toBe('9007199254740993');
  });

  it('renders dates, timestamps and binary as strings', () => {
    const instant = new Date(Date.UTC(2015, 7, 26, 12, 30));
    expect(valueToJson(instant, DateType)).toBe('2015-08-26');
    expect(valueToJson(instant, TimestampType)).toBe('2015-08-26T12:30:00.000Z');
    expect(valueToJson(instant, TimestampNTZType)).toBe('2015-08-26T12:30:00.000');
    expect(valueToJson(new Uint8Array([104, 105]), BinaryType)).toBe('aGk=');
  });

  it('renders non-finite doubles as strings', () => {
    expect(valueToJson(Number.NaN, DoubleType)).toBe('NaN');
    expect(valueToJson(Number.NEGATIVE_INFINITY, DoubleType)).toBe('-Infinity');
  });

  it('renders maps as objects', () => {
    expect(valueToJson(mapData([['k', 1]]), mapType(StringType, IntegerType))).toEqual({ k: 1 });
  });

  it('renders rows by field name', () => {
    expect(rowToJson([1, null], parseSchemaDDL('a INT, b STRING'))).toEqual({ a: 1, b: null });
  });
});

describe('jsonToValue', () => {
  it('reads typed values', () => {
    expect(jsonToValue('12', LongType)).toBe(12n);
    expect(jsonToValue(7, LongType)).toBe(7n);
    expect(jsonToValue(1.5, decimalType(4, 2))).toBe('1.50');
    expect(jsonToValue('Infinity', DoubleType)).toBe(Number.POSITIVE_INFINITY);
    expect(jsonToValue('2015-08-26', DateType)).toEqual(new Date(Date.UTC(2015, 7, 26)));
    expect(jsonToValue('2015-08-26T12:00:00+02:00', TimestampType)).toEqual(new Date(Date.UTC(2015, 7, 26, 10)));
    expect(jsonToValue('aGk=', BinaryType)).toEqual(new Uint8Array([104, 105]));
  });

  it('reads maps with typed keys', () => {
    expect(jsonToValue({ '1': 'x' }, mapType(IntegerType, StringType))).toEqual(mapData([[1, 'x']]));
  });

  it('rejects values of the wrong type with their path', () => {
    expect(() => jsonToValue('1', IntegerType, '$.a')).toThrow(InvalidInputError);
    expect(() => jsonToValue(300, ByteType, '$.b')).toThrow(
      '$.b: expected TINYINT, got 300',
    );
  });
});

describe('jsonToRow', () => {
  const schema = parseSchemaDDL('a INT, b STRING');

  it('reads objects by name and arrays by position', () => {
    expect(jsonToRow({ b: 'x', a: 1 }, schema)).toEqual([1, 'x']);
    expect(jsonToRow([1], schema)).toEqual([1, null]);
  });

  it('rejects scalars', () => {
    expect(() => jsonToRow('1,x', schema, '$.rows[0]')).toThrow(
      '$.rows[0]: expected STRUCT<a: INT, b: STRING>, got "1,x"',
    );
  });
});
