// src/core/lock-identity.ts

import { createHash } from 'crypto';
import * as path from 'path';

export const LOCK_FILE_PREFIX = 'command-runtime';

const MAX_NORMALIZED_LENGTH = 64;

/**
 * Collapses every run of non-alphanumeric characters into a single dash.
 */
export function normalizeLockName(name: string): string {
  return name.replace(/[^a-zA-Z0-9]+/g, '-').slice(0, MAX_NORMALIZED_LENGTH);
}

/**
 * `command-runtime-<normalized>-<sha256>.lock`. The digest keeps names that
 * normalize alike (`a.b` and `a_b`) apart.
 */
export function lockFileName(lockName: string): string {
  const digest = createHash('sha256').update(lockName, 'utf8').digest('hex');
  return `${LOCK_FILE_PREFIX}-${normalizeLockName(lockName)}-${digest}.lock`;
}

export function lockFilePath(lockDir: string, lockName: string): string {
  return path.join(path.resolve(lockDir), lockFileName(lockName));
}
