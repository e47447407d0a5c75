// src/contracts/errors.ts

export type SyncErrorKind =
  | 'transient'
  | 'fatal'
  | 'configuration'
  | 'data_integrity'
  | 'payload_decode'
  | 'validation';

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, HTTP 429 or 5xx. Retried inside a single gateway call. */
export class TransientContactError extends SyncError {
  readonly kind = 'transient' as const;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    readonly status?: number,
    options: { cause?: unknown; retryAfterMs?: number } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Any other 4xx. Never retried. */
export class FatalContactError extends SyncError {
  readonly kind = 'fatal' as const;

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export class ConfigurationError extends SyncError {
  readonly kind = 'configuration' as const;
}

/** An external source returned a value of the wrong shape. */
export class DataIntegrityError extends SyncError {
  readonly kind = 'data_integrity' as const;
}

export class PayloadDecodeError extends SyncError {
  readonly kind = 'payload_decode' as const;
}

export class ContactValidationError extends SyncError {
  readonly kind = 'validation' as const;
}

export function isSyncError(e: unknown): e is SyncError {
  return e instanceof SyncError;
}

export function errorMessage(e: unknown, fallback = 'Unexpected error'): string {
  if (e instanceof Error && e.message) return e.message;
  if (typeof e === 'string' && e) return e;
  return fallback;
}
