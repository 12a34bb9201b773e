export type FailureKind =
  | 'ValidationFailed'
  | 'NotFound'
  | 'StoreBusy'
  | 'StoreUnavailable'
  | 'IOFailure';

/**
 * Base class for every failure the storage components surface to callers.
 * `kind` is the stable discriminant; the message is for logs, not for users.
 */
export class StorageError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export type ValidationReason = 'empty' | 'too_long' | 'invalid_text';

export class ValidationError extends StorageError {
  readonly field: string;
  readonly reason: ValidationReason;

  constructor(field: string, reason: ValidationReason, message: string, options?: { cause?: unknown }) {
    super('ValidationFailed', message, options);
    this.field = field;
    this.reason = reason;
  }
}
