import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/errors';
import { parseDataType, parseSchemaDDL, schemaToDDL, typeToSQL } from '../src/parsers/schemaDDL';
import {
  arrayType,
  decimalType,
  DoubleType,
  IntegerType,
  StringType,
  structField,
  structType,
} from '../src/types/schema';

describe('parseSchemaDDL', () => {
  it('parses a field list', () => {
    expect(parseSchemaDDL('a INT, b DOUBLE')).toEqual(
      structType([structField('a', IntegerType), structField('b', DoubleType)]),
    );
  });

  it('parses a struct type', () => {
    expect(parseSchemaDDL('STRUCT<a: INT, b: ARRAY<STRING>>')).toEqual(
      structType([structField('a', IntegerType), structField('b', arrayType(StringType))]),
    );
  });

  it('reads NOT NULL and skips comments', () => {
    expect(parseSchemaDDL("a INT NOT NULL COMMENT 'id', b string")).toEqual(
      structType([structField('a', IntegerType, false), structField('b', StringType)]),
    );
  });

  it('reads type aliases and parameters', () => {
    expect(schemaToDDL(parseSchemaDDL('a LONG, b SHORT, c TINYINT, d REAL, e VARCHAR(10), f DECIMAL, g DEC(5, 2)'))).toBe(
      'a BIGINT, b SMALLINT, c TINYINT, d FLOAT, e STRING, f DECIMAL(10,0), g DECIMAL(5,2)',
    );
  });

  it('reads backquoted names', () => {
    expect(parseSchemaDDL('`first name` STRING').fields[0]?.name).toBe('first name');
  });

  it('returns an empty schema for empty text', () => {
    expect(parseSchemaDDL('  ')).toEqual(structType([]));
  });

  it('rejects unknown types', () => {
    expect(() => parseSchemaDDL('a FOO')).toThrow(ConfigurationError);
    expect(() => parseSchemaDDL('a FOO')).toThrow("unsupported data type 'FOO'");
  });

  it('rejects trailing input', () => {
    expect(() => parseSchemaDDL('a INT b')).toThrow('unexpected trailing input');
  });

  it('rejects decimals beyond the maximum precision', () => {
    expect(() => parseDataType('DECIMAL(39, 0)')).toThrow(ConfigurationError);
  });
});

describe('typeToSQL', () => {
  it('renders nested types', () => {
    const text = 'STRUCT<a: INT, b: ARRAY<DECIMAL(10,2)>, `c d`: MAP<STRING, BIGINT>>';
    expect(typeToSQL(parseSchemaDDL(text))).toBe(text);
  });

  it('renders non-nullable struct fields', () => {
    expect(typeToSQL(structType([structField('x', decimalType(4, 1), false)]))).toBe('STRUCT<x: DECIMAL(4,1) NOT NULL>');
  });

  it('renders timestamps and the null type', () => {
    expect(typeToSQL(parseDataType('TIMESTAMP_NTZ'))).toBe('TIMESTAMP_NTZ');
    expect(typeToSQL(parseDataType('timestamp_ltz'))).toBe('TIMESTAMP');
    expect(typeToSQL(parseDataType('VOID'))).toBe('VOID');
  });
});
