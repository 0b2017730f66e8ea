import { describe, expect, it } from 'vitest';
import { CsvOptions } from '../src/config/csvOptions';
import { BadRecordError, InternalError, MalformedRecordError } from '../src/errors';
import { CsvRecordParser } from '../src/parsers/csvRecordParser';
import { FailureSafeParser } from '../src/parsers/failureSafeParser';
import { parseSchemaDDL } from '../src/parsers/schemaDDL';
import type { RecordParser } from '../src/types/csv';
import type { Row } from '../src/types/record';
import { utcSettings } from './helpers';

const schema = parseSchemaDDL('a INT, b STRING');
const withCorrupt = parseSchemaDDL('a INT, b STRING, _corrupt_record STRING');

function fakeParser(parse: (text: string) => Row[]): RecordParser {
  return { parse };
}

describe('FailureSafeParser', () => {
  it('projects the parsed row onto the output schema by name', () => {
    const output = parseSchemaDDL('b STRING, missing INT, a INT');
    const parser = new FailureSafeParser(fakeParser(() => [[1, 'x']]), 'PERMISSIVE', output, undefined, schema);
    expect(parser.parse('1,x')).toEqual(['x', null, 1]);
  });

  it('fails with an internal error when the raw parser yields several rows', () => {
    const parser = new FailureSafeParser(
      fakeParser(() => [[1, 'x'], [2, 'y']]),
      'PERMISSIVE',
      schema,
      undefined,
      schema,
    );
    expect(() => parser.parse('1,x')).toThrow(InternalError);
    expect(() => parser.parse('1,x')).toThrow('Expected one row from CSV parser.');
  });

  it('returns the partial row and the record text under PERMISSIVE', () => {
    const raw = fakeParser((text) => {
      throw new BadRecordError(text, [1, null], new Error('bad b'));
    });
    const parser = new FailureSafeParser(raw, 'PERMISSIVE', withCorrupt, '_corrupt_record', schema);
    expect(parser.parse('1,?')).toEqual([1, null, '1,?']);
  });

  it('returns nulls when there is no partial row', () => {
    const raw = fakeParser((text) => {
      throw new BadRecordError(text, undefined, new Error('unclosed quote'));
    });
    const parser = new FailureSafeParser(raw, 'PERMISSIVE', withCorrupt, '_corrupt_record', schema);
    expect(parser.parse('"x')).toEqual([null, null, '"x']);
  });

  it('throws MalformedRecordError under FAILFAST', () => {
    const raw = fakeParser((text) => {
      throw new BadRecordError(text, [1, null], new Error('bad b'));
    });
    const parser = new FailureSafeParser(raw, 'FAILFAST', schema, undefined, schema);
    try {
      parser.parse('1,?');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRecordError);
      expect(err instanceof MalformedRecordError && err.record).toBe('1,?');
      expect(err instanceof MalformedRecordError && err.errorClass).toBe('MALFORMED_RECORD_IN_PARSING');
    }
  });

  it('passes other errors through', () => {
    const raw = fakeParser(() => {
      throw new RangeError('boom');
    });
    const parser = new FailureSafeParser(raw, 'PERMISSIVE', schema, undefined, schema);
    expect(() => parser.parse('x')).toThrow(RangeError);
  });
});

describe('CsvRecordParser', () => {
  const options = new CsvOptions({}, utcSettings);

  it('yields no rows for empty text', () => {
    expect(new CsvRecordParser(schema, schema, options).parse('')).toEqual([]);
  });

  it('reports the converted fields of a bad record', () => {
    const parser = new CsvRecordParser(parseSchemaDDL('a INT, b INT'), parseSchemaDDL('a INT, b INT'), options);
    try {
      parser.parse('x,2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BadRecordError);
      expect(err instanceof BadRecordError && err.partialResult).toEqual([null, 2]);
      expect(err instanceof BadRecordError && err.message).toBe("failed to parse INT from 'x'");
    }
  });

  it('converts every field when column pruning is off', () => {
    const unpruned = new CsvOptions({}, { ...utcSettings, columnPruning: false });
    const parser = new CsvRecordParser(parseSchemaDDL('a INT, b INT'), parseSchemaDDL('b INT'), unpruned);
    expect(() => parser.parse('x,2')).toThrow(BadRecordError);
  });

  it('trims tokens when asked', () => {
    const trimming = new CsvOptions(
      { ignoreLeadingWhiteSpace: 'true', ignoreTrailingWhiteSpace: 'true' },
      utcSettings,
    );
    expect(new CsvRecordParser(schema, schema, trimming).parse(' 1 , x ')).toEqual([[1, 'x']]);
  });
});
