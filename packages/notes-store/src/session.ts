import { silentLogger, type Logger } from '@notekeep/shared';

import type { NotesStore } from './store';
import type { Note } from './types';
import { applyMutation, INITIAL_VERSION, type Version, type Versioned } from './version';

export interface NotesSessionOptions {
  initialVersion?: Version;
  logger?: Logger;
}

/**
 * Caller-side glue: every successful write bumps the session's version by one
 * and returns it with the write's result.
 */
export class NotesSession {
  private readonly store: NotesStore;
  private readonly logger: Logger;
  private currentVersion: Version;

  constructor(store: NotesStore, options: NotesSessionOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? silentLogger;
    this.currentVersion = options.initialVersion ?? INITIAL_VERSION;
  }

  get version(): Version {
    return this.currentVersion;
  }

  insert(title: string, body: string): Versioned<number> {
    return this.mutate('insert', () => this.store.insert(title, body));
  }

  update(id: number, title: string, body: string): Versioned<Note> {
    return this.mutate(`update ${id}`, () => this.store.update(id, title, body));
  }

  delete(id: number): Versioned<number> {
    return this.mutate(`delete ${id}`, () => {
      this.store.delete(id);
      return id;
    });
  }

  listAll(params?: { query?: string }): Note[] {
    return this.store.listAll(params);
  }

  private mutate<T>(label: string, operation: () => T): Versioned<T> {
    const outcome = applyMutation(this.currentVersion, operation);
    this.currentVersion = outcome.version;
    this.logger.debug?.(`[notes-session] ${label} -> version ${outcome.version}`);
    return outcome;
  }
}
