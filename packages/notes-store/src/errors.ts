import { errorCode, StorageError, ValidationError, type ValidationReason } from '@notekeep/shared';

export { ValidationError };

export class NoteNotFoundError extends StorageError {
  readonly id: number;

  constructor(id: number) {
    super('NotFound', `Note ${id} does not exist.`);
    this.id = id;
  }
}

export class StoreBusyError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('StoreBusy', message, options);
  }
}

export class StoreUnavailableError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('StoreUnavailable', message, options);
  }
}

type ConstraintViolation = { field: string; reason: ValidationReason };

const CHECK_CONSTRAINTS: Record<string, ConstraintViolation> = {
  notes_title_not_blank: { field: 'title', reason: 'empty' },
  notes_title_no_nul: { field: 'title', reason: 'invalid_text' },
  notes_body_not_blank: { field: 'body', reason: 'empty' },
  notes_body_no_nul: { field: 'body', reason: 'invalid_text' },
  notes_body_max_length: { field: 'body', reason: 'too_long' },
};

function constraintViolationFor(error: unknown): ConstraintViolation {
  const message = error instanceof Error ? error.message : '';
  const check = /^CHECK constraint failed: (\w+)/.exec(message);
  const known = check?.[1] ? CHECK_CONSTRAINTS[check[1]] : undefined;
  if (known) {
    return known;
  }
  const notNull = /^NOT NULL constraint failed: notes\.(\w+)/.exec(message);
  return { field: notNull?.[1] ?? 'note', reason: 'empty' };
}

/**
 * Maps a better-sqlite3 failure onto the storage taxonomy. Errors that are
 * not SQLite errors are returned unchanged.
 */
export function translateSqliteError(error: unknown, action: string): unknown {
  if (error instanceof StorageError) {
    return error;
  }
  const code = errorCode(error);
  if (!code || !code.startsWith('SQLITE_')) {
    return error;
  }
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) {
    return new StoreBusyError(`Notes store is busy; could not ${action}`, { cause: error });
  }
  if (code === 'SQLITE_CONSTRAINT_CHECK' || code === 'SQLITE_CONSTRAINT_NOTNULL') {
    const { field, reason } = constraintViolationFor(error);
    return new ValidationError(
      field,
      reason,
      `Rejected by storage constraint while trying to ${action}`,
      { cause: error },
    );
  }
  return new StoreUnavailableError(`Notes store is unavailable; could not ${action}`, {
    cause: error,
  });
}
