/**
 * Date/time patterns for the `dateFormat`, `timestampFormat` and `timestampNTZFormat`
 * options, and zone offsets for IANA time zones.
 *
 * Supported pattern letters: y (year), M (month), d (day), H (hour 0-23), m (minute),
 * s (second), S (fraction of second), X (offset, `Z` for zero), Z (offset `+HHmm`).
 * Text in single quotes is literal, `''` is a quote, and `[...]` marks an optional
 * section.
 */

type FieldLetter = 'y' | 'M' | 'd' | 'H' | 'm' | 's' | 'S' | 'X' | 'Z';

type PatternPart =
  | { type: 'literal'; text: string }
  | { type: 'field'; letter: FieldLetter; width: number }
  | { type: 'optional'; parts: PatternPart[] };

export interface DateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** Present when the text carried an explicit offset */
  offsetMinutes?: number;
}

const MAX_WIDTH: Record<FieldLetter, number> = {
  y: 4,
  M: 2,
  d: 2,
  H: 2,
  m: 2,
  s: 2,
  S: 9,
  X: 3,
  Z: 3,
};

function isFieldLetter(ch: string): ch is FieldLetter {
  return ch in MAX_WIDTH;
}

function compilePattern(pattern: string): PatternPart[] {
  const stack: PatternPart[][] = [[]];
  const top = (): PatternPart[] => {
    const parts = stack[stack.length - 1];
    if (!parts) throw new Error('unbalanced optional section');
    return parts;
  };

  let i = 0;
  while (i < pattern.length) {
    const ch = pattern.charAt(i);

    if (ch === "'") {
      if (pattern.charAt(i + 1) === "'") {
        top().push({ type: 'literal', text: "'" });
        i += 2;
        continue;
      }
      let j = i + 1;
      let text = '';
      while (true) {
        if (j >= pattern.length) throw new Error('unterminated quoted literal');
        if (pattern.charAt(j) === "'") {
          if (pattern.charAt(j + 1) === "'") {
            text += "'";
            j += 2;
            continue;
          }
          break;
        }
        text += pattern.charAt(j);
        j += 1;
      }
      top().push({ type: 'literal', text });
      i = j + 1;
      continue;
    }

    if (ch === '[') {
      stack.push([]);
      i += 1;
      continue;
    }

    if (ch === ']') {
      if (stack.length === 1) throw new Error("unexpected ']'");
      const parts = top();
      stack.pop();
      top().push({ type: 'optional', parts });
      i += 1;
      continue;
    }

    if (/[A-Za-z]/.test(ch)) {
      let width = 1;
      while (pattern.charAt(i + width) === ch) width += 1;
      if (!isFieldLetter(ch)) throw new Error(`unsupported pattern letter '${ch}'`);
      if (width > MAX_WIDTH[ch] || (ch === 'y' && width === 3)) {
        throw new Error(`too many pattern letters: '${ch.repeat(width)}'`);
      }
      top().push({ type: 'field', letter: ch, width });
      i += width;
      continue;
    }

    top().push({ type: 'literal', text: ch });
    i += 1;
  }

  if (stack.length !== 1) throw new Error('unbalanced optional section');
  return top();
}

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

function formatOffset(offsetMinutes: number, letter: 'X' | 'Z', width: number): string {
  if (letter === 'X' && offsetMinutes === 0) return 'Z';
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const hh = pad(Math.floor(abs / 60), 2);
  const mm = pad(abs % 60, 2);
  if (letter === 'Z') return `${sign}${hh}${mm}`;
  if (width === 1) return abs % 60 === 0 ? `${sign}${hh}` : `${sign}${hh}${mm}`;
  if (width === 2) return `${sign}${hh}${mm}`;
  return `${sign}${hh}:${mm}`;
}

const OFFSET_REGEX = /^([+-])(\d{2})(?::?(\d{2}))?/;

interface Cursor {
  text: string;
  pos: number;
  fields: DateTimeFields;
}

function readDigits(cursor: Cursor, min: number, max: number): number | undefined {
  let end = cursor.pos;
  while (end < cursor.text.length && end - cursor.pos < max && /\d/.test(cursor.text.charAt(end))) {
    end += 1;
  }
  if (end - cursor.pos < min) return undefined;
  const digits = cursor.text.slice(cursor.pos, end);
  cursor.pos = end;
  return Number.parseInt(digits, 10);
}

function parseParts(parts: PatternPart[], cursor: Cursor): boolean {
  for (const part of parts) {
    if (part.type === 'literal') {
      if (!cursor.text.startsWith(part.text, cursor.pos)) return false;
      cursor.pos += part.text.length;
      continue;
    }

    if (part.type === 'optional') {
      const saved = { pos: cursor.pos, fields: { ...cursor.fields } };
      if (!parseParts(part.parts, cursor)) {
        cursor.pos = saved.pos;
        cursor.fields = saved.fields;
      }
      continue;
    }

    const { letter, width } = part;
    if (letter === 'X' || letter === 'Z') {
      if (letter === 'X' && cursor.text.charAt(cursor.pos) === 'Z') {
        cursor.fields.offsetMinutes = 0;
        cursor.pos += 1;
        continue;
      }
      const match = OFFSET_REGEX.exec(cursor.text.slice(cursor.pos));
      if (!match) return false;
      const hours = Number(match[2]);
      const minutes = match[3] === undefined ? 0 : Number(match[3]);
      const total = hours * 60 + minutes;
      cursor.fields.offsetMinutes = match[1] === '-' ? -total : total;
      cursor.pos += match[0].length;
      continue;
    }

    if (letter === 'S') {
      const start = cursor.pos;
      const value = readDigits(cursor, width, width);
      if (value === undefined) return false;
      const digits = cursor.text.slice(start, cursor.pos);
      cursor.fields.millisecond = Number((digits + '00').slice(0, 3));
      continue;
    }

    const max = width === 1 ? (letter === 'y' ? 4 : 2) : width;
    const value = readDigits(cursor, width, max);
    if (value === undefined) return false;

    switch (letter) {
      case 'y':
        cursor.fields.year = width === 2 ? 2000 + value : value;
        break;
      case 'M':
        cursor.fields.month = value;
        break;
      case 'd':
        cursor.fields.day = value;
        break;
      case 'H':
        cursor.fields.hour = value;
        break;
      case 'm':
        cursor.fields.minute = value;
        break;
      case 's':
        cursor.fields.second = value;
        break;
    }
  }
  return true;
}

function formatParts(parts: PatternPart[], wall: Date, offsetMinutes: number): string {
  let out = '';
  for (const part of parts) {
    if (part.type === 'literal') {
      out += part.text;
      continue;
    }
    if (part.type === 'optional') {
      out += formatParts(part.parts, wall, offsetMinutes);
      continue;
    }
    const { letter, width } = part;
    switch (letter) {
      case 'y': {
        const year = wall.getUTCFullYear();
        out += width === 2 ? pad(year % 100, 2) : pad(year, width);
        break;
      }
      case 'M':
        out += pad(wall.getUTCMonth() + 1, width);
        break;
      case 'd':
        out += pad(wall.getUTCDate(), width);
        break;
      case 'H':
        out += pad(wall.getUTCHours(), width);
        break;
      case 'm':
        out += pad(wall.getUTCMinutes(), width);
        break;
      case 's':
        out += pad(wall.getUTCSeconds(), width);
        break;
      case 'S': {
        const millis = pad(wall.getUTCMilliseconds(), 3);
        out += width <= 3 ? millis.slice(0, width) : millis.padEnd(width, '0');
        break;
      }
      case 'X':
      case 'Z':
        out += formatOffset(offsetMinutes, letter, width);
        break;
    }
  }
  return out;
}

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

function isValidFields(fields: DateTimeFields): boolean {
  return (
    fields.month >= 1 &&
    fields.month <= 12 &&
    fields.day >= 1 &&
    fields.day <= daysInMonth(fields.year, fields.month) &&
    fields.hour <= 23 &&
    fields.minute <= 59 &&
    fields.second <= 59
  );
}

/**
 * Epoch milliseconds of the fields read as a UTC wall clock. Years below 100 are kept
 * as written.
 */
export function utcEpochMillis(fields: DateTimeFields): number {
  const date = new Date(Date.UTC(2000, 0, 1, fields.hour, fields.minute, fields.second, fields.millisecond));
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  return date.getTime();
}

function emptyFields(): DateTimeFields {
  return { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 };
}

/**
 * A compiled date/time pattern.
 */
export class DateTimePattern {
  readonly pattern: string;
  private readonly parts: PatternPart[];

  /**
   * @throws Error when the pattern uses an unsupported letter or is unbalanced
   */
  constructor(pattern: string) {
    this.pattern = pattern;
    this.parts = compilePattern(pattern);
  }

  /**
   * Formats an instant as seen from a clock `offsetMinutes` ahead of UTC.
   */
  format(epochMillis: number, offsetMinutes = 0): string {
    return formatParts(this.parts, new Date(epochMillis + offsetMinutes * 60_000), offsetMinutes);
  }

  /**
   * Parses the whole text. Returns null when the text does not match or names an
   * impossible date.
   */
  parse(text: string): DateTimeFields | null {
    const cursor: Cursor = { text, pos: 0, fields: emptyFields() };
    if (!parseParts(this.parts, cursor) || cursor.pos !== text.length) return null;
    return isValidFields(cursor.fields) ? cursor.fields : null;
  }
}

const ISO_TIMESTAMP =
  /^\s*([+-]?\d{4,6})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:\.(\d{1,9}))?)?)?\s*(Z|UTC|[+-]\d{2}(?::?\d{2})?)?\s*$/i;

const ISO_DATE = /^\s*([+-]?\d{4,6})(?:-(\d{1,2})(?:-(\d{1,2}))?)?(?:[T ].*)?\s*$/;

/**
 * Lenient ISO-8601 timestamp reading: `yyyy-M-d[( |T)H:m[:s[.fraction]]][zone]`.
 */
export function parseIsoTimestamp(text: string): DateTimeFields | null {
  const match = ISO_TIMESTAMP.exec(text);
  if (!match) return null;
  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const fields: DateTimeFields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: hour === undefined ? 0 : Number(hour),
    minute: minute === undefined ? 0 : Number(minute),
    second: second === undefined ? 0 : Number(second),
    millisecond: fraction === undefined ? 0 : Number((fraction + '00').slice(0, 3)),
  };
  if (zone !== undefined) {
    const upper = zone.toUpperCase();
    if (upper === 'Z' || upper === 'UTC') {
      fields.offsetMinutes = 0;
    } else {
      const offset = OFFSET_REGEX.exec(zone);
      if (!offset) return null;
      const total = Number(offset[2]) * 60 + (offset[3] === undefined ? 0 : Number(offset[3]));
      fields.offsetMinutes = offset[1] === '-' ? -total : total;
    }
  }
  return isValidFields(fields) ? fields : null;
}

/**
 * Lenient date reading: `yyyy`, `yyyy-M`, `yyyy-M-d`, optionally followed by a time part
 * which is ignored.
 */
export function parseIsoDate(text: string): DateTimeFields | null {
  const match = ISO_DATE.exec(text);
  if (!match) return null;
  const [, year, month, day] = match;
  const fields: DateTimeFields = {
    ...emptyFields(),
    year: Number(year),
    month: month === undefined ? 1 : Number(month),
    day: day === undefined ? 1 : Number(day),
  };
  return isValidFields(fields) ? fields : null;
}

/**
 * Offsets of one IANA time zone. Owns its `Intl.DateTimeFormat`.
 */
export class ZoneClock {
  readonly zoneId: string;
  private readonly formatter?: Intl.DateTimeFormat;

  /**
   * @throws RangeError when the zone is unknown
   */
  constructor(zoneId: string) {
    this.zoneId = zoneId;
    const upper = zoneId.toUpperCase();
    if (upper !== 'UTC' && upper !== 'Z' && upper !== 'GMT') {
      this.formatter = new Intl.DateTimeFormat('en-US', {
        timeZone: zoneId,
        hourCycle: 'h23',
        year: 'numeric',
        month: 'numeric',
        day: 'numeric',
        hour: 'numeric',
        minute: 'numeric',
        second: 'numeric',
      });
    }
  }

  /** Minutes the zone's wall clock is ahead of UTC at the given instant */
  offsetMinutes(epochMillis: number): number {
    if (!this.formatter) return 0;
    const parts: Record<string, number> = {};
    for (const part of this.formatter.formatToParts(new Date(epochMillis))) {
      if (part.type !== 'literal') parts[part.type] = Number(part.value);
    }
    const wall = Date.UTC(
      parts.year ?? 1970,
      (parts.month ?? 1) - 1,
      parts.day ?? 1,
      parts.hour ?? 0,
      parts.minute ?? 0,
      parts.second ?? 0,
    );
    const truncated = epochMillis - (((epochMillis % 1000) + 1000) % 1000);
    return Math.round((wall - truncated) / 60_000);
  }

  /** Instant of a wall-clock time in this zone; an explicit offset in the fields wins */
  toEpochMillis(fields: DateTimeFields): number {
    const wall = utcEpochMillis(fields);
    if (fields.offsetMinutes !== undefined) return wall - fields.offsetMinutes * 60_000;
    const first = this.offsetMinutes(wall);
    const guess = wall - first * 60_000;
    const second = this.offsetMinutes(guess);
    return second === first ? guess : wall - second * 60_000;
  }
}
