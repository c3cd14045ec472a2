// src/core/commands-registry.ts

import type { CliCommand } from './types/command.js';
import { DuplicateCommandError, InvalidCommandIdError } from '../utils/errors.js';

/**
 * Id the dispatcher reserves for its own help command.
 */
export const HELP_COMMAND_ID = 'help';

/**
 * Registry of the commands an application exposes, keyed by command id.
 *
 * @example
 * ```typescript
 * const registry = new CommandsRegistry();
 * registry.register(new SayHelloCommand());
 * registry.register(new ExclusiveCommand(new GreetCommand(), lockDir));
 *
 * await dispatch(process.argv.slice(2), registry);
 * ```
 */
export class CommandsRegistry {
  private commands = new Map<string, CliCommand>();

  /**
   * Register a command.
   *
   * @throws InvalidCommandIdError if the id is empty
   * @throws DuplicateCommandError if the id is taken or reserved; the registry is left unchanged
   */
  register(command: CliCommand): void {
    const id = command.id;

    if (typeof id !== 'string' || id.trim() === '') {
      throw new InvalidCommandIdError(String(id));
    }
    if (id === HELP_COMMAND_ID) {
      throw new DuplicateCommandError(id, true);
    }
    if (this.commands.has(id)) {
      throw new DuplicateCommandError(id);
    }

    this.commands.set(id, command);
  }

  /**
   * Install (or replace) the command behind a reserved id.
   * Only the dispatcher calls this, once per dispatch.
   *
   * @internal
   */
  registerReserved(command: CliCommand): void {
    if (command.id !== HELP_COMMAND_ID) {
      throw new Error(`'${command.id}' is not a reserved command id`);
    }
    this.commands.set(command.id, command);
  }

  /**
   * Copy of the id → command mapping. Changing it never affects the registry.
   */
  getCommands(): Map<string, CliCommand> {
    return new Map(this.commands);
  }

  /**
   * Commands other than the reserved ones, in registration order.
   */
  getUserCommands(): CliCommand[] {
    return Array.from(this.commands.values()).filter((command) => command.id !== HELP_COMMAND_ID);
  }

  /**
   * Find a command by id. Absence is not an error here; the caller decides.
   */
  lookup(id: string): CliCommand | undefined {
    return this.commands.get(id);
  }

  has(id: string): boolean {
    return this.commands.has(id);
  }

  get size(): number {
    return this.commands.size;
  }
}
