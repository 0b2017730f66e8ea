/**
 * CSV codec contracts shared by the parsers, the writer and the expressions.
 */

import type { Row } from './record';

/**
 * Policy applied when a record cannot be parsed.
 *
 * - PERMISSIVE: malformed records become rows of nulls, with the raw text kept in the
 *   corrupt-record column
 * - DROPMALFORMED: malformed records are skipped (not accepted by single-record functions)
 * - FAILFAST: the first malformed record aborts the operation
 */
export type ParseMode = 'PERMISSIVE' | 'DROPMALFORMED' | 'FAILFAST';

export const PARSE_MODES: readonly ParseMode[] = ['PERMISSIVE', 'DROPMALFORMED', 'FAILFAST'];

/**
 * Engine-level settings merged into the user's option map.
 */
export interface EngineSettings {
  /** Convert only the fields of the required schema */
  columnPruning: boolean;
  /** Zone used when the options carry no `timeZone` */
  defaultTimeZoneId?: string;
  /** Corrupt-record column name used when the options carry none */
  defaultColumnNameOfCorruptRecord: string;
}

/**
 * Raw single-record parser. Yields zero or one row for a single logical record and
 * throws `BadRecordError` when the record is malformed.
 */
export interface RecordParser {
  parse(text: string): Row[];
}

/**
 * Raw record writer: renders one row as one delimited record, without a terminator.
 */
export interface RecordWriter {
  write(row: Row): string;
}

/**
 * Infers a schema from one sample record and returns it as DDL text.
 */
export interface SchemaInferenceEvaluator {
  evaluate(sample: string): string;
}
