import type { NextFunction, Request, Response } from 'express';
import {
  ConfigurationError,
  CsvCodecError,
  DataTypeMismatchError,
  InvalidInputError,
  MalformedRecordError,
} from '../errors';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/**
 * HTTP status for an error raised while serving a request.
 */
export function statusForError(err: unknown): number {
  if (err instanceof MalformedRecordError) return 422;
  if (
    err instanceof ConfigurationError ||
    err instanceof DataTypeMismatchError ||
    err instanceof InvalidInputError ||
    isBodyParseError(err)
  ) {
    return 400;
  }
  return 500;
}

export interface ErrorBody {
  success: false;
  error: string;
  errorClass?: string;
  messageParameters?: Readonly<Record<string, string>>;
  hint?: string;
}

export function errorBody(err: unknown): ErrorBody {
  if (err instanceof CsvCodecError) {
    return {
      success: false,
      error: err.message,
      errorClass: err.errorClass,
      messageParameters: err.messageParameters,
      hint: err.hint,
    };
  }
  return { success: false, error: err instanceof Error ? err.message : 'Internal server error' };
}

/**
 * Express error middleware: codec errors become 4xx responses, anything else a 500.
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const status = statusForError(err);
  if (status >= 500) {
    console.error('[API] Error:', err);
  } else {
    const detail = err instanceof CsvCodecError ? err.format() : err instanceof Error ? err.message : String(err);
    console.warn(`[API] ${req.method} ${req.path} rejected (${status}): ${detail}`);
  }
  res.status(status).json(errorBody(err));
};
