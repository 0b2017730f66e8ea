import { ConfigurationError } from '../errors';
import { DateTimePattern, ZoneClock } from '../parsers/dateTimePattern';
import { PARSE_MODES } from '../types/csv';
import type { EngineSettings, ParseMode } from '../types/csv';

/**
 * Record terminator forced by single-record functions. U+FFFF is a Unicode
 * noncharacter, so the whole input value is read as one record.
 */
export const SINGLE_RECORD_LINE_SEP = '\uFFFF';

export const DEFAULT_DATE_FORMAT = 'yyyy-MM-dd';
export const DEFAULT_TIMESTAMP_WRITE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSXXX";
export const DEFAULT_TIMESTAMP_NTZ_WRITE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS";

/**
 * Option keys are matched case-insensitively.
 */
class CaseInsensitiveOptions {
  private readonly entries = new Map<string, string>();

  constructor(parameters: Readonly<Record<string, string>>) {
    for (const [key, value] of Object.entries(parameters)) {
      this.entries.set(key.toLowerCase(), value);
    }
  }

  get(key: string): string | undefined {
    return this.entries.get(key.toLowerCase());
  }
}

function toDelimiter(value: string): string {
  switch (value) {
    case '\\t':
      return '\t';
    default:
      if (value.length === 0) {
        throw ConfigurationError.invalidOption('sep', value, 'delimiter cannot be empty');
      }
      return value;
  }
}

function compilePattern(option: string, pattern: string): DateTimePattern {
  try {
    return new DateTimePattern(pattern);
  } catch (err) {
    throw ConfigurationError.invalidOption(
      option,
      pattern,
      err instanceof Error ? err.message : 'invalid pattern',
    );
  }
}

export function parseMode(value: string): ParseMode {
  const upper = value.toUpperCase();
  const mode = PARSE_MODES.find((m) => m === upper);
  if (!mode) {
    throw ConfigurationError.invalidParseMode(value);
  }
  return mode;
}

/**
 * Resolved CSV options: the user's option map plus engine settings.
 * Immutable once built.
 */
export class CsvOptions {
  readonly delimiter: string;
  readonly quote: string;
  readonly escape: string;
  readonly comment?: string;
  /** Accepted for compatibility; single-record functions never skip a header */
  readonly header: boolean;
  readonly ignoreLeadingWhiteSpace: boolean;
  readonly ignoreTrailingWhiteSpace: boolean;
  readonly nullValue: string;
  readonly nanValue: string;
  readonly positiveInf: string;
  readonly negativeInf: string;
  readonly quoteAll: boolean;
  readonly prefersDecimal: boolean;
  readonly preferDate: boolean;
  readonly lineSep?: string;
  readonly parseMode: ParseMode;
  readonly columnNameOfCorruptRecord: string;
  /** True when the corrupt-record column was named in the options rather than by the engine */
  readonly corruptRecordColumnExplicit: boolean;
  readonly columnPruning: boolean;

  readonly dateFormat: DateTimePattern;
  readonly dateFormatExplicit: boolean;
  /** Unset means lenient ISO-8601 reading and the default write pattern */
  readonly timestampFormat?: DateTimePattern;
  readonly timestampNTZFormat?: DateTimePattern;

  private readonly timeZoneOption?: string;
  private readonly defaultTimeZoneId?: string;

  constructor(parameters: Readonly<Record<string, string>>, settings: EngineSettings) {
    const options = new CaseInsensitiveOptions(parameters);
    const bool = (name: string, fallback: boolean): boolean => {
      const value = options.get(name);
      if (value === undefined) return fallback;
      const lower = value.trim().toLowerCase();
      if (lower === 'true') return true;
      if (lower === 'false') return false;
      throw ConfigurationError.invalidOption(name, value, 'expected true or false');
    };
    const char = (name: string, fallback: string): string => {
      const value = options.get(name) ?? fallback;
      if (value.length !== 1) {
        throw ConfigurationError.invalidOption(name, value, 'expected a single character');
      }
      return value;
    };

    this.delimiter = toDelimiter(options.get('sep') ?? options.get('delimiter') ?? ',');
    this.quote = char('quote', '"');
    this.escape = char('escape', '"');
    const comment = options.get('comment');
    this.comment = comment === undefined || comment === '' ? undefined : comment;
    this.header = bool('header', false);
    this.ignoreLeadingWhiteSpace = bool('ignoreLeadingWhiteSpace', false);
    this.ignoreTrailingWhiteSpace = bool('ignoreTrailingWhiteSpace', false);
    this.nullValue = options.get('nullValue') ?? '';
    this.nanValue = options.get('nanValue') ?? 'NaN';
    this.positiveInf = options.get('positiveInf') ?? 'Inf';
    this.negativeInf = options.get('negativeInf') ?? '-Inf';
    this.quoteAll = bool('quoteAll', false);
    this.prefersDecimal = bool('prefersDecimal', false);
    this.preferDate = bool('preferDate', true);

    const lineSep = options.get('lineSep');
    if (lineSep !== undefined && lineSep.length === 0) {
      throw ConfigurationError.invalidOption('lineSep', lineSep, 'line separator cannot be empty');
    }
    this.lineSep = lineSep;

    this.parseMode = parseMode(options.get('mode') ?? 'PERMISSIVE');

    const corruptColumn = options.get('columnNameOfCorruptRecord');
    this.corruptRecordColumnExplicit = corruptColumn !== undefined;
    this.columnNameOfCorruptRecord = corruptColumn ?? settings.defaultColumnNameOfCorruptRecord;
    this.columnPruning = settings.columnPruning;

    const dateFormat = options.get('dateFormat');
    this.dateFormatExplicit = dateFormat !== undefined;
    this.dateFormat = compilePattern('dateFormat', dateFormat ?? DEFAULT_DATE_FORMAT);
    const timestampFormat = options.get('timestampFormat');
    this.timestampFormat =
      timestampFormat === undefined ? undefined : compilePattern('timestampFormat', timestampFormat);
    const timestampNTZFormat = options.get('timestampNTZFormat');
    this.timestampNTZFormat =
      timestampNTZFormat === undefined
        ? undefined
        : compilePattern('timestampNTZFormat', timestampNTZFormat);

    this.timeZoneOption = options.get('timeZone');
    this.defaultTimeZoneId = settings.defaultTimeZoneId;
  }

  /**
   * The zone timestamps are read and written in: the `timeZone` option, else the
   * engine's zone.
   */
  get zoneId(): string {
    const zoneId = this.timeZoneOption ?? this.defaultTimeZoneId;
    if (zoneId === undefined) {
      throw new ConfigurationError(
        'UNRESOLVED_TIME_ZONE',
        'The expression has no time zone; bind it with withTimeZone() before evaluating.',
      );
    }
    return zoneId;
  }

  /**
   * Builds a clock for `zoneId`. Callers keep the clock for their own lifetime.
   */
  createZoneClock(): ZoneClock {
    const zoneId = this.zoneId;
    try {
      return new ZoneClock(zoneId);
    } catch (err) {
      throw new ConfigurationError(
        'INVALID_TIME_ZONE',
        `Invalid time zone '${zoneId}'.`,
        { zoneId },
        { cause: err },
      );
    }
  }

  /**
   * Copy with extra options layered on top; engine settings are kept.
   */
  static withOverrides(
    parameters: Readonly<Record<string, string>>,
    overrides: Readonly<Record<string, string>>,
    settings: EngineSettings,
  ): CsvOptions {
    const merged: Record<string, string> = {};
    const overridden = new Set(Object.keys(overrides).map((k) => k.toLowerCase()));
    for (const [key, value] of Object.entries(parameters)) {
      if (!overridden.has(key.toLowerCase())) merged[key] = value;
    }
    return new CsvOptions({ ...merged, ...overrides }, settings);
  }
}
