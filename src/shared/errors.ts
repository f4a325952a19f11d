// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'VALIDATION'
  | 'UPSTREAM_ERROR'
  | 'NOT_CONFIGURED'
  | 'INTERNAL';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown event slug, or no ranking snapshot for a requested date. */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

/** Caller-supplied argument is malformed or out of range. */
export class InvalidArgumentError extends AppError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** Upstream payload could not be normalized into store records. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class UpstreamError extends AppError {
  constructor(
    message: string,
    public readonly status: number | null = null
  ) {
    super('UPSTREAM_ERROR', message);
  }
}

/** A setting the operation needs is missing, e.g. an upstream API token. */
export class NotConfiguredError extends AppError {
  constructor(message: string) {
    super('NOT_CONFIGURED', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
