import { parse } from 'csv-parse/sync';
import type { Options as CsvParseOptions } from 'csv-parse/sync';
import type { CsvOptions } from '../config/csvOptions';
import { BadRecordError } from '../errors';
import type { ZoneClock } from './dateTimePattern';
import type { RecordParser } from '../types/csv';
import type { Row, Value } from '../types/record';
import type { StructType } from '../types/schema';
import { makeValueConverter } from './valueConverters';
import type { ValueConverter } from './valueConverters';

interface FieldSlot {
  /** Position of the field's token in the record */
  tokenIndex: number;
  convert: ValueConverter;
}

/**
 * Build csv-parse options from resolved CSV options.
 */
export function createParseOptions(options: CsvOptions): CsvParseOptions {
  return {
    delimiter: options.delimiter,
    quote: options.quote,
    escape: options.escape,
    comment: options.comment,
    record_delimiter: options.lineSep,
    ltrim: options.ignoreLeadingWhiteSpace,
    rtrim: options.ignoreTrailingWhiteSpace,
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: false,
  };
}

/**
 * csv-parse yields `unknown` records; keep only well-formed string rows.
 */
export function toTokenRecords(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  const records: string[][] = [];
  for (const record of parsed) {
    if (Array.isArray(record)) {
      records.push(record.map((token) => (typeof token === 'string' ? token : String(token))));
    }
  }
  return records;
}

/**
 * Raw parser for one CSV record.
 *
 * Tokens are matched to `dataSchema` by position. The returned row is aligned to
 * `requiredSchema`; with column pruning only the required fields are converted.
 * Throws `BadRecordError` when the record cannot be tokenized, has the wrong number
 * of tokens, or a token cannot be converted.
 */
export class CsvRecordParser implements RecordParser {
  private readonly parseOptions: CsvParseOptions;
  private readonly nullValue: string;
  private readonly tokenCount: number;
  /** Fields converted per record, in data-schema order */
  private readonly converted: FieldSlot[];
  /** For each required field, its position within `converted` */
  private readonly projection: number[];

  constructor(
    dataSchema: StructType,
    requiredSchema: StructType,
    options: CsvOptions,
    clock: ZoneClock = options.createZoneClock(),
  ) {
    this.parseOptions = createParseOptions(options);
    this.nullValue = options.nullValue;
    this.tokenCount = dataSchema.fields.length;

    const requiredNames = new Set(requiredSchema.fields.map((f) => f.name));
    this.converted = [];
    const convertedIndex = new Map<string, number>();
    dataSchema.fields.forEach((field, tokenIndex) => {
      if (options.columnPruning && !requiredNames.has(field.name)) return;
      convertedIndex.set(field.name, this.converted.length);
      this.converted.push({ tokenIndex, convert: makeValueConverter(field.dataType, options, clock) });
    });
    this.projection = requiredSchema.fields.map((f) => convertedIndex.get(f.name) ?? -1);
  }

  parse(text: string): Row[] {
    let records: string[][];
    try {
      records = toTokenRecords(parse(text, this.parseOptions));
    } catch (err) {
      throw new BadRecordError(text, undefined, err);
    }
    return records.map((tokens) => this.convert(text, tokens));
  }

  private convert(text: string, tokens: readonly string[]): Row {
    let failure: unknown =
      tokens.length === this.tokenCount
        ? undefined
        : new Error(
            `Malformed CSV record: expected ${this.tokenCount} tokens, found ${tokens.length}`,
          );

    const values: Value[] = this.converted.map(({ tokenIndex, convert }) => {
      const token = tokens[tokenIndex];
      if (token === undefined || token === this.nullValue) return null;
      try {
        return convert(token);
      } catch (err) {
        failure ??= err;
        return null;
      }
    });

    const row = this.projection.map((index) => (index === -1 ? null : (values[index] ?? null)));
    if (failure !== undefined) {
      throw new BadRecordError(text, row, failure);
    }
    return row;
  }
}
