import { stringifyJson } from './values';

export type ExtractionErrorCode =
  | 'CONNECTIVITY_FAILURE'
  | 'UNSUPPORTED_CURSOR_TYPE'
  | 'MISSING_CURSOR_ATTRIBUTE'
  | 'CURSOR_TYPE_MISMATCH'
  | 'INVALID_CONFIG';

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The store could not be reached while listing, describing or scanning */
export class ConnectivityError extends ExtractionError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('CONNECTIVITY_FAILURE', `${operation} failed: ${detail}`, { cause });
  }
}

export class UnsupportedCursorTypeError extends ExtractionError {
  constructor(
    readonly stream: string,
    readonly attribute: string,
    readonly inferredType: string
  ) {
    super(
      'UNSUPPORTED_CURSOR_TYPE',
      `Unsupported cursor type "${inferredType}" for attribute "${attribute}" of stream "${stream}"`
    );
  }
}

export class MissingCursorAttributeError extends ExtractionError {
  constructor(
    readonly stream: string,
    readonly attribute: string
  ) {
    super('MISSING_CURSOR_ATTRIBUTE', `Cursor attribute "${attribute}" is not in the schema of stream "${stream}"`);
  }
}

export class CursorTypeMismatchError extends ExtractionError {
  constructor(stream: string, attribute: string, expected: string, value: unknown) {
    super(
      'CURSOR_TYPE_MISMATCH',
      `Cursor attribute "${attribute}" of stream "${stream}" holds ${stringifyJson(value)}, expected a ${expected} value`
    );
  }
}

export class ConfigError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
  }
}
