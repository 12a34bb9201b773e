import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, unlink, type FileHandle } from 'node:fs/promises';
import path from 'node:path';

import { errorCode, StorageError } from '@notekeep/shared';

/**
 * `sync-dir` is the only step that fails after the target already holds the
 * new content; every other write step leaves the target untouched.
 */
export type AtomicWriteStep =
  | 'mkdir'
  | 'open'
  | 'write'
  | 'sync'
  | 'rename'
  | 'sync-dir'
  | 'read'
  | 'parse';

export class AtomicWriteError extends StorageError {
  readonly filePath: string;
  readonly step: AtomicWriteStep;
  readonly code: string | undefined;

  constructor(filePath: string, step: AtomicWriteStep, cause: unknown) {
    const code = errorCode(cause);
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('IOFailure', `Failed to ${step} ${filePath}: ${detail}`, { cause });
    this.filePath = filePath;
    this.step = step;
    this.code = code;
  }
}

function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${randomUUID()}.tmp`);
}

async function syncDirectory(dir: string): Promise<void> {
  // Directories cannot be opened for sync on Windows.
  if (process.platform === 'win32') {
    return;
  }
  const handle = await open(dir, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      console.error('Failed to remove temporary file after atomic write failure', filePath, err);
    }
  }
}

/**
 * Replaces the content of `filePath` with `content`. Readers see either the
 * previous file or the complete new one, never a partial write.
 *
 * The temporary file lives next to the target so the final rename stays on
 * one filesystem. Data is synced before the rename so a power loss cannot
 * expose a renamed but empty file.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string | Uint8Array,
): Promise<void> {
  const target = path.resolve(filePath);
  const dir = path.dirname(target);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new AtomicWriteError(target, 'mkdir', err);
  }

  const tempPath = tempPathFor(target);
  let handle: FileHandle;
  try {
    handle = await open(tempPath, 'wx');
  } catch (err) {
    throw new AtomicWriteError(target, 'open', err);
  }

  let step: AtomicWriteStep = 'write';
  try {
    try {
      await handle.writeFile(content, 'utf-8');
      step = 'sync';
      await handle.sync();
    } finally {
      await handle.close();
    }
    step = 'rename';
    await rename(tempPath, target);
  } catch (err) {
    await removeQuietly(tempPath);
    throw new AtomicWriteError(target, step, err);
  }

  try {
    await syncDirectory(dir);
  } catch (err) {
    throw new AtomicWriteError(target, 'sync-dir', err);
  }
}

export async function readFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return undefined;
    }
    throw new AtomicWriteError(path.resolve(filePath), 'read', err);
  }
}
