/**
 * Base class for every error raised by the codec.
 *
 * `errorClass` is a stable identifier callers can branch on; `messageParameters`
 * carries the values that were interpolated into the message.
 */
export class CsvCodecError extends Error {
  readonly errorClass: string;
  readonly messageParameters: Readonly<Record<string, string>>;
  readonly hint?: string;

  constructor(
    errorClass: string,
    message: string,
    messageParameters: Record<string, string> = {},
    options: { hint?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CsvCodecError';
    this.errorClass = errorClass;
    this.messageParameters = Object.freeze({ ...messageParameters });
    this.hint = options.hint;
  }

  format(): string {
    const lines = [`error[${this.errorClass}]: ${this.message}`];
    if (this.hint) {
      lines.push(`help: ${this.hint}`);
    }
    return lines.join('\n');
  }
}
