import fs from 'node:fs';
import path from 'node:path';

import { MAX_NOTE_BODY_LENGTH, silentLogger, type Logger } from '@notekeep/shared';
import Database from 'better-sqlite3';
import { z } from 'zod';

import { NoteNotFoundError, StoreUnavailableError, translateSqliteError } from './errors';
import type { Note } from './types';
import { isNoteId, normalizeNoteInput } from './validation';

export const NOTES_DB_FILENAME = 'notes.db';
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;
// Largest timeout better-sqlite3 accepts (a signed 32-bit millisecond count).
export const MAX_BUSY_TIMEOUT_MS = 2_147_483_647;

// Characters SQLite's trim() should strip: space, \t, \n, \v, \f, \r.
// length() stops at a NUL, hence the separate NUL checks.
const SQL_WHITESPACE = 'char(32, 9, 10, 11, 12, 13)';
const ISO_NOW = `(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;
const NOTE_COLUMNS = 'id, title, body, created_at, updated_at';

const MIGRATIONS: Array<{ version: number; up: (db: Database.Database) => void }> = [
  {
    version: 1,
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS notes (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL
            CONSTRAINT notes_title_not_blank CHECK (trim(title, ${SQL_WHITESPACE}) <> '')
            CONSTRAINT notes_title_no_nul CHECK (instr(title, char(0)) = 0),
          body TEXT NOT NULL
            CONSTRAINT notes_body_not_blank CHECK (trim(body, ${SQL_WHITESPACE}) <> '')
            CONSTRAINT notes_body_no_nul CHECK (instr(body, char(0)) = 0)
            CONSTRAINT notes_body_max_length CHECK (length(body) <= ${MAX_NOTE_BODY_LENGTH}),
          created_at TEXT NOT NULL DEFAULT ${ISO_NOW},
          updated_at TEXT NOT NULL DEFAULT ${ISO_NOW}
        );

        CREATE INDEX IF NOT EXISTS idx_notes_created_at ON notes(created_at DESC);
      `);
    },
  },
];

const NoteRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  body: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const SchemaVersionRowSchema = z.object({ version: z.number().nullable() });
const CountRowSchema = z.object({ count: z.number() });

function nowIso(): string {
  return new Date().toISOString();
}

function buildDbPath(dataDir: string): string {
  return path.join(dataDir, NOTES_DB_FILENAME);
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function parseRow<T>(schema: z.ZodType<T>, row: unknown): T {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new StoreUnavailableError('Notes store returned an unexpected row', {
      cause: result.error,
    });
  }
  return result.data;
}

function openDatabase(dbPath: string, busyTimeoutMs: number): Database.Database {
  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    // `timeout` is SQLite's busy timeout: how long a write waits for the lock.
    return new Database(dbPath, { timeout: busyTimeoutMs });
  } catch (error) {
    throw new StoreUnavailableError(`Cannot open notes store at ${dbPath}`, { cause: error });
  }
}

export interface NotesStoreOptions {
  /**
   * Upper bound on how long a write waits for another connection's lock
   * before failing with `StoreBusyError`.
   */
  busyTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Single-table SQLite store for notes. Constraints are enforced both here and
 * in the schema, so a buggy caller cannot persist an invalid note.
 */
export class NotesStore {
  private readonly db: Database.Database;
  private readonly dbPath: string;
  private readonly logger: Logger;
  private initialized = false;

  constructor(dataDir: string, options: NotesStoreOptions = {}) {
    const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    if (
      !Number.isInteger(busyTimeoutMs) ||
      busyTimeoutMs < 0 ||
      busyTimeoutMs > MAX_BUSY_TIMEOUT_MS
    ) {
      throw new RangeError(
        `busyTimeoutMs must be an integer between 0 and ${MAX_BUSY_TIMEOUT_MS}`,
      );
    }
    this.logger = options.logger ?? silentLogger;
    this.dbPath = buildDbPath(dataDir);
    this.db = openDatabase(this.dbPath, busyTimeoutMs);
  }

  static open(dataDir: string, options?: NotesStoreOptions): NotesStore {
    const store = new NotesStore(dataDir, options);
    try {
      store.init();
    } catch (error) {
      store.close();
      throw error;
    }
    return store;
  }

  get filePath(): string {
    return this.dbPath;
  }

  /** Safe to call on every startup; existing notes are never touched. */
  init(): void {
    this.run('initialize the notes store', () => {
      const journalMode = this.db.pragma('journal_mode = WAL', { simple: true });
      if (journalMode !== 'wal') {
        this.logger.warn(
          `[notes-store] journal_mode is ${String(journalMode)}; readers may block on writers`,
        );
      }
      this.db.pragma('foreign_keys = ON');
      this.applyMigrations();
    });
    this.initialized = true;
    this.logger.debug?.(`[notes-store] ready at ${this.dbPath}`);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  checkpoint(): void {
    this.run('checkpoint the write-ahead log', () => {
      this.db.pragma('wal_checkpoint(TRUNCATE)');
    });
  }

  getSchemaVersion(): number {
    return this.run('read the schema version', () => {
      this.ensureMigrationsTable();
      const row = this.db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get();
      return parseRow(SchemaVersionRowSchema, row).version ?? 0;
    });
  }

  insert(title: string, body: string): number {
    const input = normalizeNoteInput({ title, body });
    this.ensureReady();
    return this.run('insert a note', () => {
      const now = nowIso();
      const result = this.db
        .prepare('INSERT INTO notes (title, body, created_at, updated_at) VALUES (?, ?, ?, ?)')
        .run(input.title, input.body, now, now);
      return Number(result.lastInsertRowid);
    });
  }

  update(id: number, title: string, body: string): Note {
    const input = normalizeNoteInput({ title, body });
    this.ensureReady();
    if (!isNoteId(id)) {
      throw new NoteNotFoundError(id);
    }
    const row = this.run('update a note', () =>
      this.db
        .prepare(
          `UPDATE notes
           SET title = ?, body = ?, updated_at = ?
           WHERE id = ?
           RETURNING ${NOTE_COLUMNS}`,
        )
        .get(input.title, input.body, nowIso(), id),
    );
    if (row === undefined) {
      throw new NoteNotFoundError(id);
    }
    return parseRow(NoteRowSchema, row);
  }

  /** Deleting an id that does not exist throws `NoteNotFoundError`. */
  delete(id: number): void {
    this.ensureReady();
    if (!isNoteId(id)) {
      throw new NoteNotFoundError(id);
    }
    const result = this.run('delete a note', () =>
      this.db.prepare('DELETE FROM notes WHERE id = ?').run(id),
    );
    if (result.changes === 0) {
      throw new NoteNotFoundError(id);
    }
  }

  get(id: number): Note {
    this.ensureReady();
    if (!isNoteId(id)) {
      throw new NoteNotFoundError(id);
    }
    const row = this.run('read a note', () =>
      this.db.prepare(`SELECT ${NOTE_COLUMNS} FROM notes WHERE id = ?`).get(id),
    );
    if (row === undefined) {
      throw new NoteNotFoundError(id);
    }
    return parseRow(NoteRowSchema, row);
  }

  /**
   * Snapshot of every note, newest id first. `query` keeps notes whose title
   * or body contains it (case-insensitive for ASCII).
   */
  listAll(params?: { query?: string }): Note[] {
    this.ensureReady();
    const query = params?.query?.trim();
    const rows = this.run('list notes', () => {
      if (query) {
        const pattern = `%${escapeLikePattern(query)}%`;
        return this.db
          .prepare(
            `SELECT ${NOTE_COLUMNS}
             FROM notes
             WHERE title LIKE ? ESCAPE '\\' OR body LIKE ? ESCAPE '\\'
             ORDER BY id DESC`,
          )
          .all(pattern, pattern);
      }
      return this.db.prepare(`SELECT ${NOTE_COLUMNS} FROM notes ORDER BY id DESC`).all();
    });
    return rows.map((row) => parseRow(NoteRowSchema, row));
  }

  count(): number {
    this.ensureReady();
    const row = this.run('count notes', () =>
      this.db.prepare('SELECT COUNT(*) AS count FROM notes').get(),
    );
    return parseRow(CountRowSchema, row).count;
  }

  private ensureReady(): void {
    if (!this.initialized) {
      throw new StoreUnavailableError('Notes store is not initialized; call init() first');
    }
  }

  private run<T>(action: string, operation: () => T): T {
    if (!this.db.open) {
      throw new StoreUnavailableError(`Notes store is closed; could not ${action}`);
    }
    try {
      return operation();
    } catch (error) {
      throw translateSqliteError(error, action);
    }
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL
      );
    `);
  }

  private applyMigrations(): void {
    this.ensureMigrationsTable();
    const row = this.db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get();
    const currentVersion = parseRow(SchemaVersionRowSchema, row).version ?? 0;
    const pending = MIGRATIONS.filter((migration) => migration.version > currentVersion).sort(
      (a, b) => a.version - b.version,
    );
    if (pending.length === 0) {
      return;
    }
    const apply = this.db.transaction((migration: (typeof MIGRATIONS)[number]) => {
      migration.up(this.db);
      this.db
        .prepare('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)')
        .run(migration.version, nowIso());
    });
    for (const migration of pending) {
      apply(migration);
      this.logger.info(`[notes-store] applied schema version ${migration.version}`);
    }
  }
}
