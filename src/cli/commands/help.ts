// src/cli/commands/help.ts

import { CommandWithoutFlags } from '../../core/base-command.js';
import { HELP_COMMAND_ID } from '../../core/commands-registry.js';
import type { CliCommand, CommandContext } from '../../core/types/command.js';
import { formatCommandListing } from '../help/index.js';
import type { CommandHelp, HelpFormatOptions } from '../help/types.js';

export function toCommandHelp(command: CliCommand): CommandHelp {
  return {
    id: command.id,
    description: command.description,
    flags: Array.from(command.flagDefinitions().values(), (definition) => ({
      name: definition.name,
      description: definition.description,
      defaultValue: definition.defaultValue,
      required: definition.required,
    })),
  };
}

/**
 * Lists every available command. `listCommands` is read on each run, so the
 * listing reflects the registry as it is when help executes.
 */
export class HelpCommand extends CommandWithoutFlags {
  readonly id = HELP_COMMAND_ID;
  readonly description = 'Lists all available commands';

  constructor(
    private readonly listCommands: () => readonly CliCommand[],
    private readonly formatOptions: HelpFormatOptions = {}
  ) {
    super();
  }

  exec({ output }: CommandContext): void {
    const commands = this.listCommands().map(toCommandHelp);
    output.write(formatCommandListing(this, commands, this.formatOptions));
  }
}
