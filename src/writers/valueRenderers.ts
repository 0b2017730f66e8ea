import {
  DEFAULT_TIMESTAMP_NTZ_WRITE_FORMAT,
  DEFAULT_TIMESTAMP_WRITE_FORMAT,
} from '../config/csvOptions';
import type { CsvOptions } from '../config/csvOptions';
import { DateTimePattern } from '../parsers/dateTimePattern';
import type { ZoneClock } from '../parsers/dateTimePattern';
import { isMapData, isValueArray } from '../types/record';
import type { Value } from '../types/record';
import type { DataType } from '../types/schema';

/**
 * Renders one non-null value of a fixed type as text.
 */
export type ValueRenderer = (value: Value) => string;

function renderNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return 'Infinity';
  if (value === Number.NEGATIVE_INFINITY) return '-Infinity';
  return String(value);
}

/**
 * Shortest decimal text that reads back to the same single-precision value.
 */
function renderFloat(value: number): string {
  if (!Number.isFinite(value)) return renderNumber(value);
  for (let digits = 1; digits < 9; digits++) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(Number(value.toPrecision(9)));
}

function renderScalar(value: Value): string {
  if (typeof value === 'number') return renderNumber(value);
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return new TextDecoder().decode(value);
  return String(value);
}

/**
 * Builds the renderer of a field type once; nested nulls render as `null`.
 */
export function makeValueRenderer(
  dataType: DataType,
  options: CsvOptions,
  clock: ZoneClock,
): ValueRenderer {
  switch (dataType.kind) {
    case 'float':
      return (value) => (typeof value === 'number' ? renderFloat(value) : renderScalar(value));
    case 'date': {
      const pattern = options.dateFormat;
      return (value) => (value instanceof Date ? pattern.format(value.getTime()) : renderScalar(value));
    }
    case 'timestamp': {
      const pattern = options.timestampFormat ?? new DateTimePattern(DEFAULT_TIMESTAMP_WRITE_FORMAT);
      return (value) => {
        if (!(value instanceof Date)) return renderScalar(value);
        const millis = value.getTime();
        return pattern.format(millis, clock.offsetMinutes(millis));
      };
    }
    case 'timestamp_ntz': {
      const pattern =
        options.timestampNTZFormat ?? new DateTimePattern(DEFAULT_TIMESTAMP_NTZ_WRITE_FORMAT);
      return (value) => (value instanceof Date ? pattern.format(value.getTime()) : renderScalar(value));
    }
    case 'binary': {
      const decoder = new TextDecoder();
      return (value) => (value instanceof Uint8Array ? decoder.decode(value) : renderScalar(value));
    }
    case 'array': {
      const element = nested(makeValueRenderer(dataType.elementType, options, clock));
      return (value) => (isValueArray(value) ? `[${value.map(element).join(', ')}]` : renderScalar(value));
    }
    case 'map': {
      const key = nested(makeValueRenderer(dataType.keyType, options, clock));
      const entry = nested(makeValueRenderer(dataType.valueType, options, clock));
      return (value) => {
        if (value === null || !isMapData(value)) return renderScalar(value);
        const pairs = value.keys.map((k, i) => `${key(k)} -> ${entry(value.values[i] ?? null)}`);
        return `{${pairs.join(', ')}}`;
      };
    }
    case 'struct': {
      const fields = dataType.fields.map((f) => nested(makeValueRenderer(f.dataType, options, clock)));
      return (value) => {
        if (!isValueArray(value)) return renderScalar(value);
        return `{${fields.map((render, i) => render(value[i] ?? null)).join(', ')}}`;
      };
    }
    case 'udt':
      return makeValueRenderer(dataType.sqlType, options, clock);
    default:
      return renderScalar;
  }
}

function nested(render: ValueRenderer): ValueRenderer {
  return (value) => (value === null ? 'null' : render(value));
}
