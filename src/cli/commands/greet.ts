// src/cli/commands/greet.ts

import {
  defineFlags,
  durationFlag,
  integerFlag,
  stringFlag,
  type FlagDefinitionMap,
} from '../../core/flag-definition.js';
import type { ParsedFlags } from '../../core/parsed-flags.js';
import type { CliCommand, CommandContext } from '../../core/types/command.js';

export type Sleep = (ms: number) => Promise<void>;

const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class GreetCommand implements CliCommand {
  readonly id = 'greet';
  readonly description = 'A basic command that will greet the user based on the given input.';

  constructor(private readonly wait: Sleep = sleep) {}

  flagDefinitions(): FlagDefinitionMap {
    return defineFlags(
      stringFlag('name', 'Specify the user name to greet.', { required: true }),
      integerFlag('count-to', 'Specify the number of times to greet.', { default: 1 }),
      durationFlag('count-delay', 'Specify the delay between greet repeats.', { default: 0 })
    );
  }

  validateFlags(flags: ParsedFlags): string[] {
    const violations: string[] = [];
    const countTo = flags.getNumber('count-to') ?? 1;
    const countDelay = flags.getNumber('count-delay') ?? 0;

    if (countTo <= 0) {
      violations.push(`count-to must be greater than 0, got ${countTo}`);
    }
    if (countDelay < 0) {
      violations.push(`count-delay must not be negative, got ${flags.render('count-delay')}`);
    }

    return violations;
  }

  async exec({ flags, output }: CommandContext): Promise<void> {
    const name = flags.getString('name') ?? '';
    const countTo = flags.getNumber('count-to') ?? 1;
    const countDelay = flags.getNumber('count-delay') ?? 0;

    for (let i = 0; i < countTo; i++) {
      output.write(`Hello there ${name}\n`);
      if (countDelay > 0 && i < countTo - 1) {
        await this.wait(countDelay);
      }
    }
  }
}
