/**
 * A single token could not be converted to its field's type.
 */
export class FieldParseError extends Error {
  readonly what: string;
  readonly value: string;

  constructor(what: string, value: string) {
    super(`failed to parse ${what} from '${value}'`);
    this.name = 'FieldParseError';
    this.what = what;
    this.value = value;
  }
}
