// src/utils/errors.ts

/**
 * Base class for every failure that is attributed to a single command.
 * The message is the uniform diagnostic the dispatcher prints.
 */
export abstract class CommandError extends Error {
  constructor(
    public readonly commandId: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to execute command ${commandId} with error: ${reason}`, options);
    this.name = new.target.name;
  }
}

export class CommandNotFoundError extends CommandError {
  constructor(commandId: string) {
    super(commandId, `The command ${commandId} does not exist`);
  }
}

export class FlagConfigurationError extends CommandError {
  constructor(commandId: string, cause: unknown) {
    super(commandId, `invalid flag configuration: ${describeThrown(cause)}`, { cause });
  }
}

export class ParseError extends CommandError {
  constructor(commandId: string, message: string, public readonly code?: string) {
    super(commandId, message.replace(/^error: /, '').trim());
  }
}

export class ValidationError extends CommandError {
  constructor(commandId: string, public readonly violations: readonly string[]) {
    super(commandId, violations.join('\n'));
  }
}

export class ExecutionError extends CommandError {
  constructor(commandId: string, public readonly payload: unknown) {
    super(commandId, describeThrown(payload), { cause: payload });
  }
}

export class CommandLockedError extends CommandError {
  constructor(commandId: string) {
    super(commandId, 'command is locked, skipping execution');
  }
}

export class LockError extends CommandError {
  constructor(
    commandId: string,
    public readonly operation: 'acquire' | 'release',
    cause: LockFileError
  ) {
    super(commandId, `failed to ${operation} lock for command ${commandId}: ${cause.message}`, { cause });
  }
}

export class LockFileError extends Error {
  constructor(
    public readonly path: string,
    public readonly code: string | undefined,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'LockFileError';
  }
}

export class DuplicateCommandError extends Error {
  constructor(public readonly commandId: string, reserved: boolean = false) {
    super(
      reserved
        ? `command '${commandId}' is reserved and cannot be registered`
        : `command '${commandId}' is already registered`
    );
    this.name = 'DuplicateCommandError';
  }
}

export class InvalidCommandIdError extends Error {
  constructor(public readonly commandId: string) {
    super(`command id must be a non-empty string, got '${commandId}'`);
    this.name = 'InvalidCommandIdError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Text of an arbitrary thrown value: the message of an Error, otherwise its string form.
 */
export function describeThrown(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return String(value);
  }
}

/**
 * Node system error code (ENOENT, EACCES, ...) carried by a thrown value, if any.
 */
export function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
