// src/core/file-lock.ts

import * as fs from 'fs/promises';
import * as os from 'os';
import { z } from 'zod';

import { LockFileError, describeThrown, errorCode } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * What a holder writes into its lock file, so that a later process can tell
 * whether the holder is still running.
 */
export const LockPayloadSchema = z.object({
  pid: z.number().int().positive(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

export type LockPayload = z.infer<typeof LockPayloadSchema>;

export interface FileLockOptions {
  /** Reclaim a lock file whose holder process is gone. Default: true */
  staleRecovery?: boolean;
  /** Age (ms) after which an unreadable lock file or a reclaim guard is treated as abandoned. Default: 30000 */
  staleAfterMs?: number;
}

// Lock paths currently held by this process, across all FileLock instances
const heldPaths = new Set<string>();

// Settles when the in-flight reclaim of a path finishes; never rejects
const reclaimQueues = new Map<string, Promise<void>>();

/**
 * Serialize async operations on the same `key` within this process.
 * Different keys run concurrently.
 */
async function withPathQueue<T>(key: string, fn: () => Promise<T>): Promise<T> {
  let pending = reclaimQueues.get(key);
  while (pending) {
    await pending;
    pending = reclaimQueues.get(key);
  }

  const promise = fn();
  const settled = promise.then(
    () => undefined,
    () => undefined
  );
  reclaimQueues.set(key, settled);

  try {
    return await promise;
  } finally {
    if (reclaimQueues.get(key) === settled) {
      reclaimQueues.delete(key);
    }
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) === 'EPERM';
  }
}

export function parseLockPayload(content: string): LockPayload | undefined {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return undefined;
  }
  const result = LockPayloadSchema.safeParse(data);
  return result.success ? result.data : undefined;
}

/**
 * Non-blocking, cross-process try-lock backed by a single file.
 *
 * The file is created with O_CREAT | O_EXCL, so of any number of processes
 * (or FileLock instances in one process) racing for the same path exactly one
 * succeeds; the others get `false` immediately.
 *
 * Reclaiming a stale file is serialized twice: per path within the process,
 * and across processes by a `<path>.reclaim` guard file created the same way.
 * Only the guard holder may unlink a lock file it did not create.
 */
export class FileLock {
  private held = false;
  private readonly staleRecovery: boolean;
  private readonly staleAfterMs: number;

  constructor(readonly path: string, options: FileLockOptions = {}) {
    this.staleRecovery = options.staleRecovery ?? true;
    this.staleAfterMs = options.staleAfterMs ?? 30_000;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Try to take the lock.
   *
   * @returns true when acquired, false when another holder has it
   * @throws LockFileError on filesystem failures (missing directory, permissions, I/O)
   */
  async lock(): Promise<boolean> {
    if (this.held) {
      return false;
    }

    if (await this.tryCreate()) {
      return true;
    }

    if (this.staleRecovery && (await this.reclaimAndCreate())) {
      return true;
    }

    Logger.debug(`Lock ${this.path} is held by another holder`);
    return false;
  }

  /**
   * Release the lock. Does nothing when this instance does not hold it.
   *
   * @throws LockFileError if the lock file cannot be removed
   */
  async unlock(): Promise<void> {
    if (!this.held) {
      Logger.debug(`Unlock of ${this.path} ignored: lock not held`);
      return;
    }

    try {
      await fs.unlink(this.path);
      Logger.debug(`Released lock ${this.path}`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw this.fileError('remove', error);
      }
      Logger.warn(`Lock file ${this.path} was already removed`);
    } finally {
      // Only now may another instance judge a file naming this process abandoned
      this.held = false;
      heldPaths.delete(this.path);
    }
  }

  /**
   * Current holder as recorded in the lock file, if the file exists and is readable.
   */
  async readHolder(): Promise<LockPayload | undefined> {
    const content = await this.readContent();
    return content === undefined ? undefined : parseLockPayload(content);
  }

  private async tryCreate(): Promise<boolean> {
    const handle = await this.createExclusive(this.path);
    if (!handle) {
      return false;
    }

    this.held = true;
    heldPaths.add(this.path);

    const payload: LockPayload = {
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: new Date().toISOString(),
    };

    try {
      await handle.writeFile(JSON.stringify(payload), 'utf-8');
    } catch (error) {
      await this.closeQuietly(handle, this.path);
      try {
        await this.unlock();
      } catch (unlockError) {
        Logger.warn(describeThrown(unlockError));
      }
      throw this.fileError('write', error);
    }

    await this.closeQuietly(handle, this.path);
    Logger.debug(`Acquired lock ${this.path}`);
    return true;
  }

  /**
   * @returns the open handle, or undefined when the file already exists
   */
  private async createExclusive(file: string): Promise<fs.FileHandle | undefined> {
    try {
      return await fs.open(file, 'wx');
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return undefined;
      }
      throw this.fileError('create', error);
    }
  }

  private async closeQuietly(handle: fs.FileHandle, file: string): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      Logger.warn(`Failed to close lock file ${file}: ${describeThrown(error)}`);
    }
  }

  private get guardPath(): string {
    return `${this.path}.reclaim`;
  }

  /**
   * Reclaims a stale lock file and takes the lock, holding the reclaim guard
   * throughout so that no other contender can unlink the file this one creates.
   */
  private async reclaimAndCreate(): Promise<boolean> {
    return withPathQueue(this.path, async () => {
      if (!(await this.acquireReclaimGuard())) {
        Logger.debug(`Reclaim of ${this.path} already in progress elsewhere`);
        return false;
      }

      try {
        if (!(await this.reclaimIfStale())) {
          return false;
        }
        return await this.tryCreate();
      } finally {
        await this.releaseReclaimGuard();
      }
    });
  }

  private async acquireReclaimGuard(): Promise<boolean> {
    let handle = await this.createExclusive(this.guardPath);

    if (!handle) {
      // A guard outlives its reclaim only if that process died mid-reclaim
      const age = await this.ageMs(this.guardPath);
      if (age !== undefined && age < this.staleAfterMs) {
        return false;
      }
      if (age !== undefined) {
        await this.removeIfPresent(this.guardPath);
        Logger.warn(`Removed abandoned reclaim guard ${this.guardPath}`);
      }
      handle = await this.createExclusive(this.guardPath);
      if (!handle) {
        return false;
      }
    }

    await this.closeQuietly(handle, this.guardPath);
    return true;
  }

  private async releaseReclaimGuard(): Promise<void> {
    try {
      await this.removeIfPresent(this.guardPath);
    } catch (error) {
      Logger.warn(`Failed to remove reclaim guard ${this.guardPath}: ${describeThrown(error)}`);
    }
  }

  private async removeIfPresent(file: string): Promise<void> {
    try {
      await fs.unlink(file);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw this.fileError('reclaim', error);
      }
    }
  }

  /**
   * Removes the lock file if its holder is gone. Called only under the reclaim guard.
   *
   * @returns true when the path is free to retry
   */
  private async reclaimIfStale(): Promise<boolean> {
    const content = await this.readContent();
    if (content === undefined) {
      return true;
    }

    const holder = parseLockPayload(content);
    if (holder) {
      if (!this.isAbandoned(holder)) {
        return false;
      }
    } else {
      // Possibly a holder that has created the file but not written it yet
      const age = await this.ageMs(this.path);
      if (age === undefined) {
        return true;
      }
      if (age < this.staleAfterMs) {
        return false;
      }
    }

    // Only remove the file we judged; a new holder may have replaced it meanwhile
    const current = await this.readContent();
    if (current === undefined) {
      return true;
    }
    if (current !== content) {
      return false;
    }

    await this.removeIfPresent(this.path);

    Logger.warn(
      holder
        ? `Reclaimed stale lock ${this.path} left by pid ${holder.pid} (acquired ${holder.acquiredAt})`
        : `Reclaimed unreadable lock file ${this.path}`
    );
    return true;
  }

  private isAbandoned(holder: LockPayload): boolean {
    if (holder.hostname !== os.hostname()) {
      return false;
    }
    if (holder.pid === process.pid) {
      return !heldPaths.has(this.path);
    }
    return !isProcessAlive(holder.pid);
  }

  private async readContent(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.path, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw this.fileError('read', error);
    }
  }

  private async ageMs(file: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(file);
      return Date.now() - stats.mtimeMs;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw this.fileError('inspect', error);
    }
  }

  private fileError(operation: string, error: unknown): LockFileError {
    return new LockFileError(
      this.path,
      errorCode(error),
      `could not ${operation} lock file ${this.path}: ${describeThrown(error)}`,
      { cause: error }
    );
  }
}
