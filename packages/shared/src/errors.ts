/**
 * Error Taxonomy
 *
 * Every failure the shortener reports to its callers is a ShortenerError.
 * The transport layer maps `code` to a response status; nothing else
 * should need to inspect the concrete subclass.
 */

export const ErrorCode = {
  VALIDATION: "VALIDATION",
  INVALID_URL: "INVALID_URL",
  NOT_FOUND: "NOT_FOUND",
  ALREADY_EXISTS: "ALREADY_EXISTS",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ShortenerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed custom code or URL.
 */
export class ValidationError extends ShortenerError {
  constructor(
    message: string,
    code: typeof ErrorCode.VALIDATION | typeof ErrorCode.INVALID_URL = ErrorCode.VALIDATION
  ) {
    super(code, message);
  }
}

export class NotFoundError extends ShortenerError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message);
  }
}

/**
 * Custom code collision.
 */
export class AlreadyExistsError extends ShortenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.ALREADY_EXISTS, message, options);
  }
}

export class InternalError extends ShortenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.INTERNAL, message, options);
  }
}

export function isShortenerError(err: unknown): err is ShortenerError {
  return err instanceof ShortenerError;
}
