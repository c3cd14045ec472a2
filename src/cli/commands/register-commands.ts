// src/cli/commands/register-commands.ts - Commands of the demo application

import type { CommandsRegistry } from '../../core/commands-registry.js';
import { ExclusiveCommand } from '../../core/exclusive-command.js';
import { GreetCommand } from './greet.js';
import { SayHelloCommand } from './say-hello.js';

export function registerExampleCommands(registry: CommandsRegistry, lockDir: string): void {
  registry.register(new SayHelloCommand());
  registry.register(new ExclusiveCommand(new GreetCommand(), lockDir));
}
