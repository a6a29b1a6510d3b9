export type ErrorCode = 'invalid_argument' | 'not_found' | 'conflict' | 'service_unavailable' | 'internal';

export type ErrorStatus = 400 | 404 | 409 | 500 | 503;

export abstract class ReviewRadarError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: ErrorStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends ReviewRadarError {
  readonly code = 'invalid_argument';
  readonly status = 400;
}

export class NotFoundError extends ReviewRadarError {
  readonly code = 'not_found';
  readonly status = 404;
}

export class ConflictError extends ReviewRadarError {
  readonly code = 'conflict';
  readonly status = 409;
}

export class ServiceUnavailableError extends ReviewRadarError {
  readonly code = 'service_unavailable';
  readonly status = 503;
}

/** Persistence failures. The message is for logs; HTTP callers only see a generic one. */
export class InternalError extends ReviewRadarError {
  readonly code = 'internal';
  readonly status = 500;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (caused by ${error.cause.message})` : '';
    return `${error.name}: ${error.message}${cause}`;
  }
  return String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
