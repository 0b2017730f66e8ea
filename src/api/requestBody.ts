import type { Request } from 'express';
import { InvalidInputError } from '../errors';
import { isJsonObject } from './jsonValues';

/**
 * Typed readers over an untrusted JSON request body.
 */
export class RequestBody {
  private constructor(private readonly body: Record<string, unknown>) {}

  static from(req: Request): RequestBody {
    const body: unknown = req.body;
    if (!isJsonObject(body)) {
      throw new InvalidInputError('$', 'expected a JSON object body');
    }
    return new RequestBody(body);
  }

  has(key: string): boolean {
    return this.body[key] !== undefined;
  }

  /** Raw value, for callers that validate it against a schema */
  raw(key: string): unknown {
    return this.body[key];
  }

  requireString(key: string): string {
    const value = this.body[key];
    if (typeof value !== 'string') throw new InvalidInputError(`$.${key}`, 'expected a string');
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.has(key) ? this.requireString(key) : undefined;
  }

  /** A string or null; the key must be present */
  requireNullableString(key: string): string | null {
    const value = this.body[key];
    if (value === null) return null;
    if (typeof value !== 'string') throw new InvalidInputError(`$.${key}`, 'expected a string or null');
    return value;
  }

  requireArray(key: string): unknown[] {
    const value = this.body[key];
    if (!Array.isArray(value)) throw new InvalidInputError(`$.${key}`, 'expected an array');
    return value;
  }

  requireNullableStrings(key: string): (string | null)[] {
    return this.requireArray(key).map((item, i) => nullableString(item, `$.${key}[${i}]`));
  }

  requirePartitions(key: string): (string | null)[][] {
    return this.requireArray(key).map((partition, i) => {
      if (!Array.isArray(partition)) throw new InvalidInputError(`$.${key}[${i}]`, 'expected an array');
      return partition.map((item: unknown, j) => nullableString(item, `$.${key}[${i}][${j}]`));
    });
  }

  /** The `options` object; every value must be a string */
  options(): Record<string, string> {
    const value = this.body.options;
    if (value === undefined || value === null) return {};
    if (!isJsonObject(value)) throw new InvalidInputError('$.options', 'expected an object');
    const options: Record<string, string> = {};
    for (const [key, option] of Object.entries(value)) {
      if (typeof option !== 'string') throw new InvalidInputError(`$.options.${key}`, 'expected a string');
      options[key] = option;
    }
    return options;
  }
}

function nullableString(value: unknown, path: string): string | null {
  if (value === null || typeof value === 'string') return value;
  throw new InvalidInputError(path, 'expected a string or null');
}
