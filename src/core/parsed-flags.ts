// src/core/parsed-flags.ts

import type { Command } from 'commander';
import { formatDuration, type FlagDefinitionMap, type FlagValue } from './flag-definition.js';

function isFlagValue(value: unknown): value is FlagValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Typed, read-only view of one invocation's flag values.
 *
 * A flag counts as supplied only when its value came from the command line;
 * defaults fill `get()` but never `has()`.
 */
export class ParsedFlags {
  private constructor(
    private readonly definitions: FlagDefinitionMap,
    private readonly values: ReadonlyMap<string, FlagValue>,
    private readonly supplied: ReadonlySet<string>,
    readonly args: readonly string[]
  ) {}

  static fromProgram(program: Command, definitions: FlagDefinitionMap): ParsedFlags {
    const raw: Record<string, unknown> = program.opts();
    const values = new Map<string, FlagValue>();
    const supplied = new Set<string>();

    for (const option of program.options) {
      if (!option.long) continue;
      const name = option.long.replace(/^--/, '');
      const attribute = option.attributeName();
      const value = raw[attribute];

      if (isFlagValue(value)) {
        values.set(name, value);
      }

      const source = program.getOptionValueSource(attribute);
      if (source === 'cli' || source === 'env') {
        supplied.add(name);
      }
    }

    return new ParsedFlags(definitions, values, supplied, [...program.args]);
  }

  /**
   * Flags built directly from values, all of them treated as supplied.
   * Lets a command body run without going through the parser.
   */
  static fromValues(
    values: Record<string, FlagValue>,
    definitions: FlagDefinitionMap = new Map(),
    args: readonly string[] = []
  ): ParsedFlags {
    const entries = new Map(Object.entries(values));
    return new ParsedFlags(definitions, entries, new Set(entries.keys()), args);
  }

  has(name: string): boolean {
    return this.supplied.has(name);
  }

  get(name: string): FlagValue | undefined {
    return this.values.get(name);
  }

  getString(name: string): string | undefined {
    const value = this.values.get(name);
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    throw new TypeError(`Flag '--${name}' holds a ${typeof value}, not a string`);
  }

  getNumber(name: string): number | undefined {
    const value = this.values.get(name);
    if (value === undefined || typeof value === 'number') {
      return value;
    }
    throw new TypeError(`Flag '--${name}' holds a ${typeof value}, not a number`);
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.values.get(name);
    if (value === undefined || typeof value === 'boolean') {
      return value;
    }
    throw new TypeError(`Flag '--${name}' holds a ${typeof value}, not a boolean`);
  }

  /**
   * String form of a flag's value; empty when the flag has no value.
   */
  render(name: string): string {
    const value = this.values.get(name);
    if (value === undefined) {
      return '';
    }
    if (typeof value === 'number' && this.definitions.get(name)?.kind === 'duration') {
      return formatDuration(value);
    }
    return String(value);
  }

  names(): string[] {
    return [...this.values.keys()];
  }
}
