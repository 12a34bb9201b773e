import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';

import {
  NoteNotFoundError,
  StoreBusyError,
  StoreUnavailableError,
  translateSqliteError,
  ValidationError,
} from './errors';
import { NotesStore } from './store';

async function createTempDir(): Promise<string> {
  const dir = path.join(
    os.tmpdir(),
    `notes-errors-test-${Date.now()}-${Math.random().toString(16).slice(2)}`,
  );
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

function sqliteError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function rawInsertError(db: Database.Database, title: string | null, body: string): unknown {
  try {
    db.prepare('INSERT INTO notes (title, body) VALUES (?, ?)').run(title, body);
  } catch (error) {
    return error;
  }
  throw new Error('expected the insert to be rejected');
}

describe('storage constraints', () => {
  it('rejects invalid rows written around the store API', async () => {
    const dir = await createTempDir();
    const store = NotesStore.open(dir);
    const raw = new Database(store.filePath);

    const blankTitle = translateSqliteError(rawInsertError(raw, ' \n\t ', 'body'), 'insert');
    expect(blankTitle).toBeInstanceOf(ValidationError);
    expect(blankTitle).toMatchObject({ field: 'title', reason: 'empty' });

    const blankBody = translateSqliteError(rawInsertError(raw, 'title', '  '), 'insert');
    expect(blankBody).toMatchObject({ field: 'body', reason: 'empty' });

    const longBody = translateSqliteError(rawInsertError(raw, 'title', 'z'.repeat(2001)), 'insert');
    expect(longBody).toMatchObject({ field: 'body', reason: 'too_long' });

    const nulTitle = translateSqliteError(rawInsertError(raw, '\u0000Title', 'body'), 'insert');
    expect(nulTitle).toMatchObject({ field: 'title', reason: 'invalid_text' });

    const nulLongBody = translateSqliteError(
      rawInsertError(raw, 'title', `\u0000${'y'.repeat(3000)}`),
      'insert',
    );
    expect(nulLongBody).toMatchObject({ field: 'body', reason: 'invalid_text' });

    const nullTitle = translateSqliteError(rawInsertError(raw, null, 'b'), 'insert');
    expect(nullTitle).toMatchObject({ kind: 'ValidationFailed', field: 'title' });

    expect(store.count()).toBe(0);

    raw.close();
    store.close();
  });
});

describe('translateSqliteError', () => {
  it('maps lock contention to StoreBusyError', () => {
    const busy = translateSqliteError(sqliteError('SQLITE_BUSY', 'database is locked'), 'insert');
    const locked = translateSqliteError(
      sqliteError('SQLITE_LOCKED_SHAREDCACHE', 'database table is locked'),
      'insert',
    );

    expect(busy).toBeInstanceOf(StoreBusyError);
    expect(locked).toBeInstanceOf(StoreBusyError);
  });

  it('maps disk and file failures to StoreUnavailableError', () => {
    for (const code of ['SQLITE_CANTOPEN', 'SQLITE_IOERR_WRITE', 'SQLITE_FULL', 'SQLITE_NOTADB']) {
      const translated = translateSqliteError(sqliteError(code, 'failure'), 'list notes');
      expect(translated).toBeInstanceOf(StoreUnavailableError);
      if (translated instanceof StoreUnavailableError) {
        expect(translated.message).toBe('Notes store is unavailable; could not list notes');
        expect(translated.kind).toBe('StoreUnavailable');
      }
    }
  });

  it('keeps the original error as the cause', () => {
    const original = sqliteError('SQLITE_BUSY', 'database is locked');
    const translated = translateSqliteError(original, 'insert');

    expect(translated).toBeInstanceOf(StoreBusyError);
    if (translated instanceof StoreBusyError) {
      expect(translated.cause).toBe(original);
    }
  });

  it('passes through storage errors and unrelated errors', () => {
    const notFound = new NoteNotFoundError(3);
    const plain = new TypeError('not sqlite');

    expect(translateSqliteError(notFound, 'delete')).toBe(notFound);
    expect(translateSqliteError(plain, 'delete')).toBe(plain);
  });
});
