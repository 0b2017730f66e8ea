import { describe, expect, it } from 'vitest';
import { CsvOptions } from '../src/config/csvOptions';
import { BoundReference, Literal } from '../src/expressions/expression';
import { SchemaOfCsv } from '../src/expressions/schemaOfCsv';
import { SchemaOfCsvEvaluator } from '../src/schema/schemaInference';
import { IntegerType, StringType } from '../src/types/schema';
import { testSession, utcSettings } from './helpers';

function infer(sample: string, options: Record<string, string> = {}): string {
  return new SchemaOfCsvEvaluator(new CsvOptions(options, { ...utcSettings, columnPruning: false })).evaluate(
    sample,
  );
}

describe('SchemaOfCsvEvaluator', () => {
  it('names fields by position', () => {
    expect(infer('1,abc')).toBe('STRUCT<_c0: INT, _c1: STRING>');
  });

  it('picks the narrowest type of each token', () => {
    expect(infer('1,abc,true,0.5,2015-08-26,12345678901,2015-08-26 12:00:00')).toBe(
      'STRUCT<_c0: INT, _c1: STRING, _c2: BOOLEAN, _c3: DOUBLE, _c4: DATE, _c5: BIGINT, _c6: TIMESTAMP>',
    );
  });

  it('types null tokens as strings', () => {
    expect(infer('1,,x')).toBe('STRUCT<_c0: INT, _c1: STRING, _c2: STRING>');
  });

  it('prefers decimals when asked', () => {
    expect(infer('0.5,1.25', { prefersDecimal: 'true' })).toBe('STRUCT<_c0: DECIMAL(1,1), _c1: DECIMAL(3,2)>');
  });

  it('types integers beyond BIGINT as decimals', () => {
    expect(infer('123456789012345678901234')).toBe('STRUCT<_c0: DECIMAL(24,0)>');
  });

  it('reads dates as timestamps when preferDate is off', () => {
    expect(infer('2015-08-26', { preferDate: 'false' })).toBe('STRUCT<_c0: TIMESTAMP>');
  });

  it('reads only the first record', () => {
    expect(infer('1,2\nabc')).toBe('STRUCT<_c0: INT, _c1: INT>');
  });

  it('returns an empty struct for empty text', () => {
    expect(infer('')).toBe('STRUCT<>');
  });

  it('honours the delimiter option', () => {
    expect(infer('1;x', { sep: ';' })).toBe('STRUCT<_c0: INT, _c1: STRING>');
  });
});

describe('SchemaOfCsv', () => {
  it('evaluates a constant sample', () => {
    const expr = new SchemaOfCsv({ child: new Literal('1,abc', StringType), options: {} }, testSession);
    expect(expr.checkInputDataTypes()).toEqual({ success: true });
    expect(expr.eval()).toBe('STRUCT<_c0: INT, _c1: STRING>');
    expect(expr.nullable).toBe(false);
    expect(expr.dataType).toEqual(StringType);
  });

  it('resolves its options against the session when built', () => {
    const berlin = { ...testSession, sessionTimeZone: 'Europe/Berlin' };
    const expr = new SchemaOfCsv({ child: new Literal('1', StringType), options: {} }, berlin);
    expect(expr.parsedOptions.zoneId).toBe('Europe/Berlin');
    expect(
      new SchemaOfCsv({ child: new Literal('1', StringType), options: { timeZone: 'Asia/Tokyo' } }, berlin)
        .parsedOptions.zoneId,
    ).toBe('Asia/Tokyo');
    expect(() => new SchemaOfCsv({ child: new Literal('1', StringType), options: { sep: '' } }, testSession)).toThrow(
      "Invalid value '' for option 'sep': delimiter cannot be empty",
    );
  });

  it('rejects a non-foldable input', () => {
    const expr = new SchemaOfCsv({ child: new BoundReference(0, StringType, true, 'value'), options: {} }, testSession);
    expect(expr.checkInputDataTypes()).toEqual({
      success: false,
      errorSubClass: 'NON_FOLDABLE_INPUT',
      messageParameters: { inputName: '`csv`', inputType: '"STRING"', inputExpr: '"value"' },
    });
  });

  it('rejects a null constant', () => {
    const expr = new SchemaOfCsv({ child: new Literal(null, StringType), options: {} }, testSession);
    expect(expr.checkInputDataTypes()).toEqual({
      success: false,
      errorSubClass: 'UNEXPECTED_NULL',
      messageParameters: { exprName: '`csv`' },
    });
  });

  it('rejects a non-string constant', () => {
    const expr = new SchemaOfCsv({ child: new Literal(1, IntegerType), options: {} }, testSession);
    expect(expr.checkInputDataTypes()).toEqual({
      success: false,
      errorSubClass: 'UNEXPECTED_INPUT_TYPE',
      messageParameters: { paramIndex: 'first', requiredType: '"STRING"', inputSql: '"1"', inputType: '"INT"' },
    });
  });
});
