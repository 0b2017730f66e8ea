import { CsvCodecError } from './base';

export type ConfigurationErrorClass =
  | 'UNSUPPORTED_PARSE_MODE'
  | 'INVALID_PARSE_MODE'
  | 'INVALID_CORRUPT_RECORD_TYPE'
  | 'CORRUPT_RECORD_COLUMN_NOT_FOUND'
  | 'INVALID_OPTION'
  | 'INVALID_TIME_ZONE'
  | 'UNRESOLVED_TIME_ZONE'
  | 'INVALID_SCHEMA'
  | 'UNSUPPORTED_DATA_TYPE'
  | 'WRONG_NUM_ARGS'
  | 'UNRESOLVED_ROUTINE';

/**
 * Bind-time error: the expression cannot be built with the given schema or options.
 * Never retried, never raised per row.
 */
export class ConfigurationError extends CsvCodecError {
  declare readonly errorClass: ConfigurationErrorClass;

  constructor(
    errorClass: ConfigurationErrorClass,
    message: string,
    messageParameters: Record<string, string> = {},
    options: { hint?: string; cause?: unknown } = {},
  ) {
    super(errorClass, message, messageParameters, options);
    this.name = 'ConfigurationError';
  }

  static unsupportedParseMode(functionName: string, mode: string): ConfigurationError {
    return new ConfigurationError(
      'UNSUPPORTED_PARSE_MODE',
      `${functionName}() doesn't support the ${mode} mode. Acceptable modes are PERMISSIVE and FAILFAST.`,
      { functionName, mode },
    );
  }

  static invalidParseMode(mode: string): ConfigurationError {
    return new ConfigurationError(
      'INVALID_PARSE_MODE',
      `'${mode}' is not a valid parse mode.`,
      { mode },
      { hint: 'Use one of PERMISSIVE, DROPMALFORMED or FAILFAST.' },
    );
  }

  static invalidCorruptRecordType(columnName: string): ConfigurationError {
    return new ConfigurationError(
      'INVALID_CORRUPT_RECORD_TYPE',
      `The field for corrupt records "${columnName}" must be nullable and of STRING type.`,
      { columnName },
    );
  }

  static corruptRecordColumnNotFound(columnName: string): ConfigurationError {
    return new ConfigurationError(
      'CORRUPT_RECORD_COLUMN_NOT_FOUND',
      `The corrupt record column "${columnName}" is not a field of the schema.`,
      { columnName },
      { hint: 'Add the column to the schema as a nullable STRING field.' },
    );
  }

  static invalidOption(option: string, value: string, reason: string): ConfigurationError {
    return new ConfigurationError(
      'INVALID_OPTION',
      `Invalid value '${value}' for option '${option}': ${reason}`,
      { option, value, reason },
    );
  }
}
