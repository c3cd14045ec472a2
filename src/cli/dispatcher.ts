// src/cli/dispatcher.ts - Resolves the command named in argv and runs it

import { HELP_COMMAND_ID, type CommandsRegistry } from '../core/commands-registry.js';
import { runCommand } from '../core/execution-pipeline.js';
import type { OutputSink } from '../core/output-sink.js';
import { ExitStatus, type ExitFunction, type ExitStatusCode } from '../core/types/command.js';
import { ErrorFactory } from '../utils/error-factory.js';
import { CommandNotFoundError, describeThrown } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { HelpCommand } from './commands/help.js';

export interface DispatchOptions {
  /** Sink for command output and diagnostics. Default: process.stdout */
  output?: OutputSink;
  /** Receives the exit status. Default: process.exit */
  exit?: ExitFunction;
  /** Colour the help listing */
  color?: boolean;
}

export interface CommandInput {
  name: string;
  args: string[];
}

/**
 * Splits argv (without the program name) into the command name and its own
 * arguments. A leading bare `--` is dropped first.
 */
export function parseCommandInput(argv: readonly string[]): CommandInput {
  const tokens = argv[0] === '--' ? argv.slice(1) : argv;
  if (tokens.length === 0) {
    return { name: '', args: [] };
  }
  return { name: tokens[0].trim(), args: tokens.slice(1) };
}

function reportFailure(error: unknown, commandId: string, output: OutputSink): void {
  const diagnostic = ErrorFactory.createDiagnostic(error, commandId);
  Logger.debug(`[${commandId}] failed: ${diagnostic.message}`);

  try {
    output.write(ErrorFactory.formatDiagnostic(diagnostic));
  } catch (writeError) {
    Logger.error(
      `Error writing to the provided output sink ${output.constructor.name}: ${describeThrown(writeError)}`
    );
    Logger.error(diagnostic.message);
  }
}

/**
 * Runs the command named by `argv` against `registry` and reports the exit
 * status through `options.exit`. An empty command name runs `help`.
 *
 * @returns The exit status passed to `exit`
 */
export async function dispatch(
  argv: readonly string[],
  registry: CommandsRegistry,
  options: DispatchOptions = {}
): Promise<ExitStatusCode> {
  const output = options.output ?? process.stdout;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  registry.registerReserved(
    new HelpCommand(() => registry.getUserCommands(), { color: options.color ?? false })
  );

  const { name, args } = parseCommandInput(argv);
  const commandId = name === '' ? HELP_COMMAND_ID : name;
  Logger.debug(`Dispatching '${commandId}' with ${args.length} argument(s)`);

  try {
    const command = registry.lookup(commandId);
    if (!command) {
      throw new CommandNotFoundError(commandId);
    }
    await runCommand(command, args, output);
  } catch (error) {
    reportFailure(error, commandId, output);
    exit(ExitStatus.Error);
    return ExitStatus.Error;
  }

  exit(ExitStatus.Ok);
  return ExitStatus.Ok;
}
