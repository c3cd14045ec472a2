// src/__tests__/utils/errors.test.ts

import { describe, it, expect } from 'vitest';
import {
  CommandError,
  CommandLockedError,
  CommandNotFoundError,
  ConfigurationError,
  DuplicateCommandError,
  ExecutionError,
  FlagConfigurationError,
  InvalidCommandIdError,
  LockError,
  LockFileError,
  ParseError,
  ValidationError,
  describeThrown,
  errorCode,
} from '../../utils/errors.js';

describe('CommandError subclasses', () => {
  it('should format the uniform diagnostic message', () => {
    const error = new CommandNotFoundError('unknown-cmd');

    expect(error.message).toBe(
      'Failed to execute command unknown-cmd with error: The command unknown-cmd does not exist'
    );
    expect(error.reason).toBe('The command unknown-cmd does not exist');
    expect(error.commandId).toBe('unknown-cmd');
  });

  it('should name each error after its class', () => {
    expect(new CommandNotFoundError('x').name).toBe('CommandNotFoundError');
    expect(new CommandLockedError('x').name).toBe('CommandLockedError');
    expect(new ValidationError('x', []).name).toBe('ValidationError');
  });

  it('should be instances of CommandError and Error', () => {
    const error = new CommandLockedError('greet');

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should report a locked command', () => {
    expect(new CommandLockedError('greet').message).toBe(
      'Failed to execute command greet with error: command is locked, skipping execution'
    );
  });

  it('should strip the parser prefix from parse errors', () => {
    const error = new ParseError('greet', "error: unknown option '--nmae'", 'commander.unknownOption');

    expect(error.reason).toBe("unknown option '--nmae'");
    expect(error.code).toBe('commander.unknownOption');
  });

  it('should join validation violations with newlines', () => {
    const error = new ValidationError('greet', ["flag 'name' is required", 'count-to must be greater than 0, got 0']);

    expect(error.reason).toBe("flag 'name' is required\ncount-to must be greater than 0, got 0");
    expect(error.violations).toHaveLength(2);
  });

  it('should describe the cause of a flag configuration failure', () => {
    const cause = new Error("Duplicate flag definition '--name'");
    const error = new FlagConfigurationError('greet', cause);

    expect(error.reason).toBe("invalid flag configuration: Duplicate flag definition '--name'");
    expect(error.cause).toBe(cause);
  });

  it('should keep the thrown payload of an execution failure', () => {
    const payload = { code: 7 };
    const error = new ExecutionError('sync', payload);

    expect(error.reason).toBe('{"code":7}');
    expect(error.payload).toBe(payload);
    expect(error.cause).toBe(payload);
  });

  it('should embed the lock file failure in a lock error', () => {
    const cause = new LockFileError('/locks/a.lock', 'EACCES', 'could not create lock file /locks/a.lock: denied');
    const error = new LockError('greet', 'acquire', cause);

    expect(error.message).toBe(
      'Failed to execute command greet with error: failed to acquire lock for command greet: could not create lock file /locks/a.lock: denied'
    );
    expect(error.operation).toBe('acquire');
    expect(error.cause).toBe(cause);
  });
});

describe('registry and configuration errors', () => {
  it('should report duplicate and reserved ids differently', () => {
    expect(new DuplicateCommandError('greet').message).toBe("command 'greet' is already registered");
    expect(new DuplicateCommandError('help', true).message).toBe(
      "command 'help' is reserved and cannot be registered"
    );
  });

  it('should report an invalid command id', () => {
    const error = new InvalidCommandIdError('');

    expect(error.message).toBe("command id must be a non-empty string, got ''");
    expect(error.name).toBe('InvalidCommandIdError');
  });

  it('should not be command errors', () => {
    expect(new DuplicateCommandError('greet')).not.toBeInstanceOf(CommandError);
    expect(new ConfigurationError('bad')).not.toBeInstanceOf(CommandError);
    expect(new ConfigurationError('bad').name).toBe('ConfigurationError');
  });
});

describe('describeThrown()', () => {
  it('should use the message of an Error', () => {
    expect(describeThrown(new TypeError('bad type'))).toBe('bad type');
  });

  it('should pass strings through', () => {
    expect(describeThrown('kaput')).toBe('kaput');
  });

  it('should serialize plain values', () => {
    expect(describeThrown(42)).toBe('42');
    expect(describeThrown(null)).toBe('null');
    expect(describeThrown(['a', 1])).toBe('["a",1]');
  });

  it('should fall back to String() when JSON has nothing to offer', () => {
    expect(describeThrown(undefined)).toBe('undefined');

    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(describeThrown(circular)).toBe('[object Object]');
  });
});

describe('errorCode()', () => {
  it('should read a string code', () => {
    expect(errorCode(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe('ENOENT');
  });

  it('should ignore values without a string code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode({ code: 5 })).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});
