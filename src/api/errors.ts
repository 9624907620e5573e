/**
 * Failure taxonomy shared by the request engine and the command layer.
 *
 * Every failure that can reach the top level is one of these four kinds, so
 * callers (and tests) can branch on `kind` instead of matching messages.
 */

export type FailureKind = 'transport' | 'api' | 'decode' | 'validation';

/** No response was obtained: timeout, DNS failure, refused connection. */
export class TransportError extends Error {
  override name = 'TransportError';
  readonly kind = 'transport' as const;

  constructor(message: string, opts?: { cause?: unknown }) {
    super(`request failed: ${message}`, opts);
  }
}

/** The API answered with status >= 400. `body` is the raw response text. */
export class ApiError extends Error {
  override name = 'ApiError';
  readonly kind = 'api' as const;
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`HTTP ${status}: ${body}`);
    this.status = status;
    this.body = body;
  }
}

/** A success payload that is not JSON or does not match the expected shape. */
export class DecodeError extends Error {
  override name = 'DecodeError';
  readonly kind = 'decode' as const;

  constructor(what: string, detail: string, opts?: { cause?: unknown }) {
    super(`decoding ${what}: ${detail}`, opts);
  }
}

/** Raised by the command layer before any request is made. */
export class ValidationError extends Error {
  override name = 'ValidationError';
  readonly kind = 'validation' as const;
}

export type CliFailure = TransportError | ApiError | DecodeError | ValidationError;

export function isCliFailure(err: unknown): err is CliFailure {
  return (
    err instanceof TransportError ||
    err instanceof ApiError ||
    err instanceof DecodeError ||
    err instanceof ValidationError
  );
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
