import { describe, expect, it } from 'vitest';
import { CsvToStructs } from '../src/expressions/csvToStructs';
import { BoundReference, Literal } from '../src/expressions/expression';
import {
  createFunction,
  fromCsv,
  optionsFromExpression,
  schemaFromExpression,
  schemaOfCsv,
} from '../src/expressions/functionRegistry';
import { StructsToCsv } from '../src/expressions/structsToCsv';
import { ConfigurationError, DataTypeMismatchError } from '../src/errors';
import { mapData } from '../src/types/record';
import { IntegerType, mapType, StringType, structType } from '../src/types/schema';
import { testSession } from './helpers';

const stringMap = mapType(StringType, StringType);
const value = new BoundReference(0, StringType, true, 'value');

function errorClassOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof ConfigurationError || err instanceof DataTypeMismatchError ? err.errorClass : undefined;
  }
  return undefined;
}

describe('schemaFromExpression', () => {
  it('parses a constant DDL string', () => {
    expect(schemaFromExpression(new Literal('a INT', StringType)).fields.map((f) => f.name)).toEqual(['a']);
  });

  it('rejects a non-constant schema', () => {
    expect(() => schemaFromExpression(value)).toThrow('The schema should be a constant STRING, but got value.');
    expect(errorClassOf(() => schemaFromExpression(new Literal(1, IntegerType)))).toBe('INVALID_SCHEMA');
  });
});

describe('optionsFromExpression', () => {
  it('reads a constant string map', () => {
    const options = new Literal(mapData([['sep', ';'], ['mode', 'FAILFAST']]), stringMap);
    expect(optionsFromExpression(options)).toEqual({ sep: ';', mode: 'FAILFAST' });
    expect(optionsFromExpression(undefined)).toEqual({});
  });

  it('rejects non-map and non-string entries', () => {
    expect(errorClassOf(() => optionsFromExpression(new Literal('sep', StringType)))).toBe('INVALID_OPTION');
    const numeric = new Literal(mapData([['sep', 1]]), mapType(StringType, IntegerType));
    expect(errorClassOf(() => optionsFromExpression(numeric))).toBe('INVALID_OPTION');
  });
});

describe('function builders', () => {
  it('builds a type-checked from_csv', () => {
    const expr = fromCsv(value, new Literal('a INT', StringType), undefined, testSession);
    expect(expr).toBeInstanceOf(CsvToStructs);
    expect(expr.sql()).toBe('from_csv(value)');
  });

  it('raises the type check failure of schema_of_csv', () => {
    try {
      schemaOfCsv(value, undefined, testSession);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DataTypeMismatchError);
      expect(err instanceof DataTypeMismatchError && err.errorClass).toBe('DATATYPE_MISMATCH.NON_FOLDABLE_INPUT');
      expect(err instanceof DataTypeMismatchError && err.message).toBe(
        'Cannot resolve "schema_of_csv(value)" due to data type mismatch: the input `csv` should be a foldable "STRING" expression; however, got "value".',
      );
    }
  });
});

describe('createFunction', () => {
  it('resolves names case-insensitively', () => {
    const child = new BoundReference(0, IntegerType);
    expect(createFunction('from_csv', [value, new Literal('a INT', StringType)], testSession)).toBeInstanceOf(
      CsvToStructs,
    );
    expect(() => createFunction('TO_CSV', [child], testSession)).toThrow(DataTypeMismatchError);
  });

  it('checks the argument count', () => {
    expect(errorClassOf(() => createFunction('from_csv', [value], testSession))).toBe('WRONG_NUM_ARGS');
    expect(() => createFunction('to_csv', [], testSession)).toThrow(
      'The `to_csv` requires [1, 2] parameters but the actual number is 0.',
    );
  });

  it('builds to_csv over a struct', () => {
    const struct = new BoundReference(0, structType([]));
    expect(createFunction('to_csv', [struct], testSession)).toBeInstanceOf(StructsToCsv);
  });

  it('rejects unknown functions', () => {
    expect(errorClassOf(() => createFunction('from_json', [value], testSession))).toBe('UNRESOLVED_ROUTINE');
  });
});
