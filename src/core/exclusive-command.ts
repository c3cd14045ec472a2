// src/core/exclusive-command.ts

import type { CliCommand, CommandContext } from './types/command.js';
import type { FlagDefinitionMap } from './flag-definition.js';
import type { ParsedFlags } from './parsed-flags.js';
import { FileLock, type FileLockOptions } from './file-lock.js';
import { lockFilePath } from './lock-identity.js';
import { CommandLockedError, LockError, LockFileError, describeThrown } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface ExclusiveCommandOptions extends FileLockOptions {
  /**
   * Logical name the lock file is derived from. Defaults to the command id.
   * Commands sharing a name share a lock.
   */
  lockName?: string;
}

/**
 * Wraps a command so that only one process on the host runs it at a time.
 *
 * The lock is a try-lock: when another holder is active, `exec` fails fast
 * with CommandLockedError and the wrapped command is never invoked.
 *
 * @example
 * ```typescript
 * registry.register(new ExclusiveCommand(new ImportCommand(), os.tmpdir()));
 * // per-configuration lock
 * registry.register(new ExclusiveCommand(new SyncCommand(), lockDir, { lockName: `sync-${tenant}` }));
 * ```
 */
export class ExclusiveCommand implements CliCommand {
  readonly lockName: string;
  readonly lockPath: string;
  private readonly fileLock: FileLock;

  constructor(
    readonly command: CliCommand,
    lockDir: string,
    options: ExclusiveCommandOptions = {}
  ) {
    this.lockName = options.lockName ?? command.id;
    if (this.lockName.trim() === '') {
      throw new Error(`Lock name for command '${command.id}' must not be empty`);
    }
    this.lockPath = lockFilePath(lockDir, this.lockName);
    this.fileLock = new FileLock(this.lockPath, options);
  }

  get id(): string {
    return this.command.id;
  }

  get description(): string {
    return this.command.description;
  }

  flagDefinitions(): FlagDefinitionMap {
    return this.command.flagDefinitions();
  }

  validateFlags(flags: ParsedFlags): string[] {
    return this.command.validateFlags?.(flags) ?? [];
  }

  /**
   * @returns true when acquired, false when another holder is active
   * @throws LockError on filesystem failures
   */
  async lock(): Promise<boolean> {
    try {
      return await this.fileLock.lock();
    } catch (error) {
      throw this.lockError('acquire', error);
    }
  }

  /**
   * Safe to call without holding the lock.
   *
   * @throws LockError if the held lock file cannot be removed
   */
  async unlock(): Promise<void> {
    try {
      await this.fileLock.unlock();
    } catch (error) {
      throw this.lockError('release', error);
    }
  }

  isLocked(): boolean {
    return this.fileLock.isHeld();
  }

  async exec(context: CommandContext): Promise<void> {
    const acquired = await this.lock();
    if (!acquired) {
      Logger.debug(`[${this.id}] lock '${this.lockName}' is held elsewhere, skipping`);
      throw new CommandLockedError(this.id);
    }

    let failure: { error: unknown } | undefined;
    try {
      await this.command.exec(context);
    } catch (error) {
      failure = { error };
    }

    try {
      await this.unlock();
    } catch (releaseError) {
      if (failure === undefined) {
        throw releaseError;
      }
      // body error wins; the release failure is only logged
      Logger.warn(`[${this.id}] ${describeThrown(releaseError)}`);
    }

    if (failure !== undefined) {
      throw failure.error;
    }
  }

  private lockError(operation: 'acquire' | 'release', error: unknown): LockError {
    const cause =
      error instanceof LockFileError
        ? error
        : new LockFileError(this.lockPath, undefined, describeThrown(error), { cause: error });
    return new LockError(this.id, operation, cause);
  }
}
