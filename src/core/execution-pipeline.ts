// src/core/execution-pipeline.ts

import { Command, CommanderError } from 'commander';

import type { CliCommand } from './types/command.js';
import type { FlagDefinitionMap } from './flag-definition.js';
import type { OutputSink } from './output-sink.js';
import { ParsedFlags } from './parsed-flags.js';
import {
  CommandError,
  ExecutionError,
  FlagConfigurationError,
  ParseError,
  ValidationError,
  describeThrown,
} from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * How an invocation that did not fail ended.
 * - executed: the command body ran to completion
 * - help: `--help` was given; usage was printed and the body did not run
 */
export type RunOutcome = 'executed' | 'help';

const HELP_CODES = new Set(['commander.helpDisplayed', 'commander.help']);

/**
 * Builds the commander program that parses one invocation of `command`.
 * Parser output (usage, `--help`) goes to the sink; parse errors are thrown, not printed.
 */
export function createFlagParser(
  command: CliCommand,
  definitions: FlagDefinitionMap,
  output: OutputSink
): Command {
  const program = new Command(command.id);

  program
    .description(command.description)
    .exitOverride()
    .allowExcessArguments(true)
    .configureOutput({
      writeOut: (str) => {
        output.write(str);
      },
      writeErr: (str) => {
        output.write(str);
      },
      // Reported once, by the dispatcher, through ParseError
      outputError: () => undefined,
    });

  for (const definition of definitions.values()) {
    definition.bind(program);
  }

  return program;
}

/**
 * Names every required flag that was not supplied with a non-empty value.
 */
export function findMissingRequiredFlags(definitions: FlagDefinitionMap, flags: ParsedFlags): string[] {
  const violations: string[] = [];

  for (const definition of definitions.values()) {
    if (!definition.required) continue;
    if (!flags.has(definition.name) || flags.render(definition.name) === '') {
      violations.push(`flag '${definition.name}' is required`);
    }
  }

  return violations;
}

/**
 * Runs one command invocation: configure flags → parse → validate → execute.
 *
 * Every failure, including anything the command body throws, reaches the
 * caller as a CommandError naming the command. Nothing thrown by the body
 * escapes in any other form.
 *
 * @param command - The command to run
 * @param args - Arguments after the command name
 * @param output - Sink for command output and usage text
 */
export async function runCommand(
  command: CliCommand,
  args: readonly string[],
  output: OutputSink
): Promise<RunOutcome> {
  const id = command.id;

  let definitions: FlagDefinitionMap;
  let program: Command;
  try {
    definitions = command.flagDefinitions();
    program = createFlagParser(command, definitions, output);
  } catch (error) {
    throw new FlagConfigurationError(id, error);
  }
  Logger.debug(`[${id}] flags configured (${definitions.size})`);

  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError && HELP_CODES.has(error.code)) {
      Logger.debug(`[${id}] usage requested, skipping execution`);
      return 'help';
    }
    output.write(program.helpInformation());
    if (error instanceof CommanderError) {
      throw new ParseError(id, error.message, error.code);
    }
    throw new ParseError(id, describeThrown(error));
  }
  Logger.debug(`[${id}] arguments parsed`);

  const flags = ParsedFlags.fromProgram(program, definitions);
  const violations = findMissingRequiredFlags(definitions, flags);
  if (violations.length === 0 && command.validateFlags) {
    try {
      violations.push(...command.validateFlags(flags));
    } catch (error) {
      violations.push(describeThrown(error));
    }
  }
  if (violations.length > 0) {
    throw new ValidationError(id, violations);
  }
  Logger.debug(`[${id}] flags validated`);

  try {
    await command.exec({ flags, output });
  } catch (error) {
    if (error instanceof CommandError) {
      throw error;
    }
    throw new ExecutionError(id, error);
  }
  Logger.debug(`[${id}] executed`);

  return 'executed';
}
