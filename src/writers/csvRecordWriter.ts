import { stringify } from 'csv-stringify/sync';
import type { Options as CsvStringifyOptions } from 'csv-stringify/sync';
import type { CsvOptions } from '../config/csvOptions';
import type { ZoneClock } from '../parsers/dateTimePattern';
import type { RecordWriter } from '../types/csv';
import type { Row } from '../types/record';
import type { StructType } from '../types/schema';
import { makeValueRenderer } from './valueRenderers';
import type { ValueRenderer } from './valueRenderers';

/**
 * Build csv-stringify options from resolved CSV options. No record terminator is
 * written.
 */
export function createStringifyOptions(options: CsvOptions): CsvStringifyOptions {
  return {
    delimiter: options.delimiter,
    quote: options.quote,
    escape: options.escape,
    quoted: options.quoteAll,
    eof: false,
  };
}

/**
 * Renders rows of one schema as single delimited records.
 *
 * Nulls are written as `nullValue`, so with the default options an empty string and a
 * null produce the same text.
 */
export class CsvRecordWriter implements RecordWriter {
  private readonly renderers: ValueRenderer[];
  private readonly nullValue: string;
  private readonly stringifyOptions: CsvStringifyOptions;

  constructor(schema: StructType, options: CsvOptions, clock: ZoneClock = options.createZoneClock()) {
    this.renderers = schema.fields.map((f) => makeValueRenderer(f.dataType, options, clock));
    this.nullValue = options.nullValue;
    this.stringifyOptions = createStringifyOptions(options);
  }

  write(row: Row): string {
    const tokens = this.renderers.map((render, i) => {
      const value = row[i] ?? null;
      return value === null ? this.nullValue : render(value);
    });
    return stringify([tokens], this.stringifyOptions);
  }
}
