import { CsvCodecError } from './base';

/**
 * Invariant violation inside the codec. Signals misuse of a component, never bad input.
 */
export class InternalError extends CsvCodecError {
  constructor(message: string) {
    super('INTERNAL_ERROR', message);
    this.name = 'InternalError';
  }
}
