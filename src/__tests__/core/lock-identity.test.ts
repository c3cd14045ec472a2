// src/__tests__/core/lock-identity.test.ts

import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import * as path from 'path';
import { lockFileName, lockFilePath, normalizeLockName } from '../../core/lock-identity.js';

describe('normalizeLockName', () => {
  it('should keep alphanumeric names', () => {
    expect(normalizeLockName('greet')).toBe('greet');
    expect(normalizeLockName('Sync42')).toBe('Sync42');
  });

  it('should collapse runs of other characters into one dash', () => {
    expect(normalizeLockName('a.b')).toBe('a-b');
    expect(normalizeLockName('a_b')).toBe('a-b');
    expect(normalizeLockName('sync / tenant:eu')).toBe('sync-tenant-eu');
    expect(normalizeLockName('..x..')).toBe('-x-');
  });

  it('should cap the result at 64 characters', () => {
    expect(normalizeLockName('x'.repeat(100))).toBe('x'.repeat(64));
  });
});

describe('lockFileName', () => {
  it('should combine prefix, normalized name and digest', () => {
    const digest = createHash('sha256').update('greet').digest('hex');

    expect(lockFileName('greet')).toBe(`command-runtime-greet-${digest}.lock`);
  });

  it('should be stable for the same name', () => {
    expect(lockFileName('sync.eu')).toBe(lockFileName('sync.eu'));
  });

  it('should keep names that normalize alike apart', () => {
    expect(lockFileName('a.b')).not.toBe(lockFileName('a_b'));
  });
});

describe('lockFilePath', () => {
  it('should place the file in the resolved lock directory', () => {
    expect(lockFilePath('locks', 'greet')).toBe(path.join(path.resolve('locks'), lockFileName('greet')));
  });
});
