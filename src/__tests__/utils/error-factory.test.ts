// src/__tests__/utils/error-factory.test.ts

import { describe, it, expect } from 'vitest';
import { ErrorFactory } from '../../utils/error-factory.js';
import {
  CommandLockedError,
  CommandNotFoundError,
  LockError,
  LockFileError,
} from '../../utils/errors.js';

describe('ErrorFactory', () => {
  describe('createDiagnostic', () => {
    it('should use the message of a command error', () => {
      const result = ErrorFactory.createDiagnostic(new CommandNotFoundError('deploy'), 'deploy');

      expect(result).toEqual({
        commandId: 'deploy',
        message: 'Failed to execute command deploy with error: The command deploy does not exist',
      });
    });

    it('should attribute any other thrown value to the command', () => {
      const result = ErrorFactory.createDiagnostic(new Error('socket closed'), 'sync');

      expect(result.commandId).toBe('sync');
      expect(result.message).toBe('Failed to execute command sync with error: socket closed');
      expect(result.suggestion).toBeUndefined();
    });

    it('should suggest waiting when the command is locked', () => {
      const result = ErrorFactory.createDiagnostic(new CommandLockedError('greet'), 'greet');

      expect(result.suggestion).toBe(
        'Another instance of this command is running. Try again once it has finished.'
      );
    });

    it('should suggest checking permissions for EACCES lock failures', () => {
      const cause = new LockFileError('/locks/g.lock', 'EACCES', 'denied');
      const result = ErrorFactory.createDiagnostic(new LockError('greet', 'acquire', cause), 'greet');

      expect(result.suggestion).toBe('Check write permissions on the lock directory.');
    });

    it('should point at the lock directory for ENOENT lock failures', () => {
      const cause = new LockFileError('/missing/g.lock', 'ENOENT', 'no such directory');
      const result = ErrorFactory.createDiagnostic(new LockError('greet', 'acquire', cause), 'greet');

      expect(result.suggestion).toBe(
        'The lock directory does not exist. Create it or point the lock at another directory.'
      );
    });

    it('should not suggest anything for other lock failures', () => {
      const cause = new LockFileError('/locks/g.lock', 'EIO', 'i/o error');
      const result = ErrorFactory.createDiagnostic(new LockError('greet', 'release', cause), 'greet');

      expect(result.suggestion).toBeUndefined();
    });
  });

  describe('formatDiagnostic', () => {
    it('should print the message on its own line', () => {
      expect(ErrorFactory.formatDiagnostic({ commandId: 'x', message: 'Failed' })).toBe('Failed\n');
    });

    it('should add an indented hint line', () => {
      expect(
        ErrorFactory.formatDiagnostic({ commandId: 'x', message: 'Failed', suggestion: 'Retry later.' })
      ).toBe('Failed\n  Hint: Retry later.\n');
    });
  });
});
