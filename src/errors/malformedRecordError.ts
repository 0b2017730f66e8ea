import { CsvCodecError } from './base';

/**
 * A record could not be parsed under FAILFAST mode. Terminal for the enclosing
 * operation.
 */
export class MalformedRecordError extends CsvCodecError {
  readonly record: string;

  constructor(record: string, cause?: unknown) {
    const reason = cause instanceof Error ? ` Cause: ${cause.message}` : '';
    super(
      'MALFORMED_RECORD_IN_PARSING',
      `Malformed CSV record detected in record parsing: ${JSON.stringify(record)}. ` +
        `Parse Mode: FAILFAST. To process malformed records as null result, try setting the option 'mode' as 'PERMISSIVE'.${reason}`,
      { badRecord: record, failFastMode: 'FAILFAST' },
      { cause },
    );
    this.name = 'MalformedRecordError';
    this.record = record;
  }
}
