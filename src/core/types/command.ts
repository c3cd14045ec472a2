// src/core/types/command.ts

import type { FlagDefinitionMap } from '../flag-definition.js';
import type { ParsedFlags } from '../parsed-flags.js';
import type { OutputSink } from '../output-sink.js';

/**
 * Command Abstraction
 *
 * Anything exposing an identity, a description, a flag contract and an
 * execution body is a command. The registry, the execution pipeline and the
 * exclusive-execution wrapper only ever see this interface.
 */
export interface CliCommand {
  /** Unique, non-empty registry key (e.g., 'greet'). Also the default lock name. */
  readonly id: string;

  /** Display text for the help listing */
  readonly description: string;

  /** Flags this command accepts, keyed by flag name */
  flagDefinitions(): FlagDefinitionMap;

  /**
   * Cross-flag or domain validation, run after every required flag is present.
   *
   * @returns One message per violation; an empty array means the flags are valid
   */
  validateFlags?(flags: ParsedFlags): string[];

  /**
   * Execution body. Failure is signalled by throwing or rejecting.
   */
  exec(context: CommandContext): Promise<void> | void;
}

/**
 * Everything a command body receives for one invocation.
 */
export interface CommandContext {
  /** Parsed and validated flag values */
  flags: ParsedFlags;

  /** Where the command writes its output */
  output: OutputSink;
}

/**
 * Process exit collaborator: receives the final status code.
 */
export type ExitFunction = (code: number) => void;

export const ExitStatus = {
  Ok: 0,
  Error: 1
} as const;

export type ExitStatusCode = (typeof ExitStatus)[keyof typeof ExitStatus];
