import type { Version } from './version';

export type SyncResult<T> = {
  items: readonly T[];
  refetched: boolean;
};

/**
 * Pull-based read model: keeps the rows it last rendered together with the
 * version they were fetched at, and re-fetches whenever it is handed a
 * different version.
 */
export class SnapshotView<T> {
  private renderedVersion: Version | undefined;
  private items: readonly T[] = [];

  get lastRenderedVersion(): Version | undefined {
    return this.renderedVersion;
  }

  get current(): readonly T[] {
    return this.items;
  }

  isStale(latestVersion: Version): boolean {
    return this.renderedVersion !== latestVersion;
  }

  sync(latestVersion: Version, fetch: () => T[]): SyncResult<T> {
    if (!this.isStale(latestVersion)) {
      return { items: this.items, refetched: false };
    }
    // If fetch throws, the rendered version is unchanged and the next sync retries.
    const items = fetch();
    this.items = items;
    this.renderedVersion = latestVersion;
    return { items, refetched: true };
  }
}
