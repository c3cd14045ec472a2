// src/index.ts - Public API

export type { CliCommand, CommandContext, ExitFunction, ExitStatusCode } from './core/types/command.js';
export { ExitStatus } from './core/types/command.js';
export { CommandWithoutFlags } from './core/base-command.js';
export { CommandsRegistry, HELP_COMMAND_ID } from './core/commands-registry.js';
export {
  FlagDefinition,
  NO_FLAGS,
  booleanFlag,
  defineFlags,
  durationFlag,
  floatFlag,
  formatDuration,
  integerFlag,
  parseDuration,
  stringFlag,
} from './core/flag-definition.js';
export type {
  FlagBinder,
  FlagDefinitionInit,
  FlagDefinitionMap,
  FlagKind,
  FlagOptions,
  FlagValue,
} from './core/flag-definition.js';
export { ParsedFlags } from './core/parsed-flags.js';
export { runCommand, findMissingRequiredFlags, type RunOutcome } from './core/execution-pipeline.js';
export { BufferedOutput, type OutputSink } from './core/output-sink.js';
export { FileLock, type FileLockOptions, type LockPayload } from './core/file-lock.js';
export { ExclusiveCommand, type ExclusiveCommandOptions } from './core/exclusive-command.js';
export { lockFileName, lockFilePath, normalizeLockName } from './core/lock-identity.js';
export { dispatch, parseCommandInput, type CommandInput, type DispatchOptions } from './cli/dispatcher.js';
export { HelpCommand } from './cli/commands/help.js';
export { RuntimeConfigLoader } from './config/runtime-config-loader.js';
export type { RuntimeConfig } from './config/schema.js';
export { Logger, LogLevel } from './utils/logger.js';
export { ErrorFactory, type CommandDiagnostic } from './utils/error-factory.js';
export {
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
} from './utils/errors.js';
