import { describe, expect, it } from 'vitest';

import { StorageError, ValidationError } from './errors';
import { describeErrorForLog, describeFailure } from './failureMessages';

describe('describeFailure', () => {
  it('gives corrective guidance for empty fields', () => {
    const error = new ValidationError('title', 'empty', 'title must not be empty');
    expect(describeFailure(error)).toBe('Title and note cannot be empty.');
  });

  it('mentions the limit for oversized bodies', () => {
    const error = new ValidationError('body', 'too_long', 'body is too long');
    expect(describeFailure(error)).toBe('Note must be at most 2000 characters.');
  });

  it('asks for different text when characters cannot be stored', () => {
    const error = new ValidationError('title', 'invalid_text', 'title contains a NUL character');
    expect(describeFailure(error)).toBe('Title and note contain characters that cannot be saved.');
  });

  it('passes through not-found messages', () => {
    const error = new StorageError('NotFound', 'Note 12 does not exist.');
    expect(describeFailure(error)).toBe('Note 12 does not exist.');
  });

  it('hides technical failures behind a generic message', () => {
    const busy = new StorageError('StoreBusy', 'database is locked');
    const io = new StorageError('IOFailure', 'ENOSPC');
    const expected = 'Something went wrong while saving your notes. Please try again.';

    expect(describeFailure(busy)).toBe(expected);
    expect(describeFailure(io)).toBe(expected);
    expect(describeFailure(new Error('boom'))).toBe(expected);
    expect(describeFailure('boom')).toBe(expected);
  });
});

describe('describeErrorForLog', () => {
  it('includes kind and cause for storage errors', () => {
    const error = new StorageError('StoreUnavailable', 'cannot open notes.db', {
      cause: new Error('SQLITE_CANTOPEN'),
    });
    expect(describeErrorForLog(error)).toBe(
      'StoreUnavailable: cannot open notes.db (cause: SQLITE_CANTOPEN)',
    );
  });

  it('falls back to plain messages', () => {
    expect(describeErrorForLog(new Error('boom'))).toBe('boom');
    expect(describeErrorForLog(42)).toBe('42');
  });
});
