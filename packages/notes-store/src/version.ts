/**
 * Change signal for views over the notes table. The value is owned by the
 * caller, starts at 0 for each process and is never persisted.
 */
export type Version = number;

export const INITIAL_VERSION: Version = 0;

export function nextVersion(version: Version): Version {
  return version + 1;
}

export type Versioned<T> = {
  version: Version;
  result: T;
};

/**
 * Runs a write and pairs its result with the bumped version. A failing write
 * throws before the version moves, so the caller keeps its previous value.
 */
export function applyMutation<T>(version: Version, mutate: () => T): Versioned<T> {
  const result = mutate();
  return { version: nextVersion(version), result };
}
