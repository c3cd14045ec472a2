// src/cli/commands/say-hello.ts

import { CommandWithoutFlags } from '../../core/base-command.js';
import type { CommandContext } from '../../core/types/command.js';

export class SayHelloCommand extends CommandWithoutFlags {
  readonly id = 'say-hello';
  readonly description = 'A basic command that will greet the user.';

  exec({ output }: CommandContext): void {
    output.write('Hello there!\n');
  }
}
