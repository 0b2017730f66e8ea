import { CsvCodecError } from './base';

/**
 * A request body or JSON value does not have the expected shape.
 */
export class InvalidInputError extends CsvCodecError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('INVALID_INPUT', `${path}: ${message}`, { path });
    this.name = 'InvalidInputError';
    this.path = path;
  }
}
