import type { Row } from '../types/record';

/**
 * Raised by a raw record parser when a record is malformed. Carries whatever could
 * be converted so the failure-safe layer can decide what to surface.
 */
export class BadRecordError extends Error {
  /** The original text of the record */
  readonly record: string;
  /** Converted row with unconvertible fields set to null, when tokenizing succeeded */
  readonly partialResult?: Row;

  constructor(record: string, partialResult: Row | undefined, cause: unknown) {
    super(cause instanceof Error ? cause.message : 'Malformed CSV record', { cause });
    this.name = 'BadRecordError';
    this.record = record;
    this.partialResult = partialResult;
  }
}
