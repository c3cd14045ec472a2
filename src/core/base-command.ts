// src/core/base-command.ts

import type { CliCommand, CommandContext } from './types/command.js';
import { NO_FLAGS, type FlagDefinitionMap } from './flag-definition.js';

/**
 * Base for commands that take no flags.
 */
export abstract class CommandWithoutFlags implements CliCommand {
  abstract readonly id: string;
  abstract readonly description: string;

  flagDefinitions(): FlagDefinitionMap {
    return NO_FLAGS;
  }

  abstract exec(context: CommandContext): Promise<void> | void;
}
