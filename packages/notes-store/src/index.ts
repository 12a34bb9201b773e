export {
  NoteNotFoundError,
  StoreBusyError,
  StoreUnavailableError,
  translateSqliteError,
  ValidationError,
} from './errors';
export { NotesSession } from './session';
export type { NotesSessionOptions } from './session';
export { SnapshotView } from './snapshotView';
export type { SyncResult } from './snapshotView';
export {
  DEFAULT_BUSY_TIMEOUT_MS,
  MAX_BUSY_TIMEOUT_MS,
  NOTES_DB_FILENAME,
  NotesStore,
} from './store';
export type { NotesStoreOptions } from './store';
export type { Note, NoteInput } from './types';
export { codePointLength, isNoteId, isStorableText, normalizeNoteInput } from './validation';
export { applyMutation, INITIAL_VERSION, nextVersion } from './version';
export type { Version, Versioned } from './version';
