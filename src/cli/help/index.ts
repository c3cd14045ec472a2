// src/cli/help/index.ts

import { Chalk } from 'chalk';
import type { CommandHelp, FlagHelp, HelpFormatOptions } from './types.js';

const DEFAULT_WIDTH = 80;
const COLUMN_GAP = 2;

// ============================================================================
// Color Utilities
// ============================================================================

function palette(color: boolean) {
  const chalk = new Chalk({ level: color ? 1 : 0 });
  return {
    title: chalk.bold.cyan,
    cmd: chalk.green,
    flag: chalk.yellow,
    desc: chalk.white,
    dim: chalk.dim,
    required: chalk.red,
  };
}

type Palette = ReturnType<typeof palette>;

// ============================================================================
// Text Layout
// ============================================================================

/**
 * Splits a description for the help column: a chunk ends at the first space
 * once it reaches `size` characters, or at a newline.
 */
export function chunkDescription(description: string, size: number): string[] {
  if (description.length === 0) {
    return [''];
  }

  const chunks: string[] = [];
  let accumulator = '';
  for (const char of description) {
    accumulator += char;
    if ((accumulator.length >= size && char === ' ') || char === '\n') {
      chunks.push(accumulator.trim());
      accumulator = '';
    }
  }

  if (accumulator.length > 0) {
    chunks.push(accumulator);
  }

  return chunks;
}

function formatFlag(flag: FlagHelp, c: Palette): string {
  let line = `${c.flag(`--${flag.name}`)} ${c.desc(flag.description)}`;
  if (flag.defaultValue !== '') {
    line += c.dim(` (default ${flag.defaultValue})`);
  }
  if (flag.required) {
    line += ` ${c.required('(required)')}`;
  }
  return line;
}

function formatCommand(cmd: CommandHelp, column: number, width: number, c: Palette): string[] {
  const indent = ' '.repeat(column);
  const [first, ...rest] = chunkDescription(cmd.description, width);
  const lines = [`${c.cmd(cmd.id)}${' '.repeat(column - cmd.id.length)}${c.desc(first)}`];

  for (const chunk of rest) {
    lines.push(`${indent}${c.desc(chunk)}`);
  }

  if (cmd.flags.length === 0) {
    lines.push(`${indent}${c.dim('Flags: none')}`);
  } else {
    lines.push(`${indent}Flags:`);
    const sorted = [...cmd.flags].sort((a, b) => a.name.localeCompare(b.name));
    for (const flag of sorted) {
      lines.push(`${indent}  ${formatFlag(flag, c)}`);
    }
  }

  return lines;
}

// ============================================================================
// Command Listing
// ============================================================================

/**
 * Renders the help listing: the help command's own row, then every command
 * (sorted by id) with its wrapped description and flags.
 */
export function formatCommandListing(
  help: { id: string; description: string },
  commands: readonly CommandHelp[],
  options: HelpFormatOptions = {}
): string {
  const c = palette(options.color ?? false);
  const width = options.width ?? DEFAULT_WIDTH;
  const sorted = [...commands].sort((a, b) => a.id.localeCompare(b.id));
  const column = Math.max(help.id.length, ...sorted.map((cmd) => cmd.id.length)) + COLUMN_GAP;

  const lines = [
    `${c.title(help.id)}${' '.repeat(column - help.id.length)}${c.desc(help.description)}`,
    '',
  ];

  for (const cmd of sorted) {
    lines.push(...formatCommand(cmd, column, width, c), '');
  }

  return lines.join('\n') + '\n';
}
