// src/core/flag-definition.ts

import { InvalidArgumentError, Option, type Command } from 'commander';

export type FlagKind = 'string' | 'integer' | 'float' | 'boolean' | 'duration' | 'custom';

export type FlagValue = string | number | boolean;

/**
 * Registers the concrete option on the commander program built for one invocation.
 */
export type FlagBinder = (program: Command) => void;

export interface FlagDefinitionInit {
  name: string;
  description: string;
  required?: boolean;
  /** Display text of the default, shown in the help listing */
  defaultValue?: string;
  kind?: FlagKind;
  bind: FlagBinder;
}

export interface FlagOptions<T extends FlagValue> {
  required?: boolean;
  default?: T;
}

export type FlagDefinitionMap = ReadonlyMap<string, FlagDefinition>;

const FLAG_NAME = /^[A-Za-z0-9][A-Za-z0-9-]*$/;

export class FlagDefinition {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  readonly defaultValue: string;
  readonly kind: FlagKind;
  private readonly binder: FlagBinder;

  constructor(init: FlagDefinitionInit) {
    if (!FLAG_NAME.test(init.name)) {
      throw new Error(`Invalid flag name '${init.name}': use letters, digits and dashes`);
    }
    this.name = init.name;
    this.description = init.description;
    this.required = init.required ?? false;
    this.defaultValue = init.defaultValue ?? '';
    this.kind = init.kind ?? 'custom';
    this.binder = init.bind;
  }

  bind(program: Command): void {
    this.binder(program);
  }
}

/**
 * Builds a flag contract from definitions, keyed by flag name.
 *
 * @throws Error if two definitions share a name
 */
export function defineFlags(...definitions: FlagDefinition[]): FlagDefinitionMap {
  const map = new Map<string, FlagDefinition>();
  for (const definition of definitions) {
    if (map.has(definition.name)) {
      throw new Error(`Duplicate flag definition '--${definition.name}'`);
    }
    map.set(definition.name, definition);
  }
  return map;
}

export const NO_FLAGS: FlagDefinitionMap = new Map();

export function stringFlag(
  name: string,
  description: string,
  options: FlagOptions<string> = {}
): FlagDefinition {
  return scalarFlag('string', name, description, options, (raw) => raw, (value) => value);
}

export function integerFlag(
  name: string,
  description: string,
  options: FlagOptions<number> = {}
): FlagDefinition {
  return scalarFlag('integer', name, description, options, parseInteger, String);
}

export function floatFlag(
  name: string,
  description: string,
  options: FlagOptions<number> = {}
): FlagDefinition {
  return scalarFlag('float', name, description, options, parseFloatValue, String);
}

/**
 * Duration flag. Values are milliseconds; the command line accepts `1h30m`, `1.5s`, `250ms` or `0`.
 */
export function durationFlag(
  name: string,
  description: string,
  options: FlagOptions<number> = {}
): FlagDefinition {
  return scalarFlag('duration', name, description, options, parseDuration, formatDuration);
}

/**
 * Presence switch: `--verbose` sets true. Defaults to false unless told otherwise.
 */
export function booleanFlag(
  name: string,
  description: string,
  options: FlagOptions<boolean> = {}
): FlagDefinition {
  const defaultValue = options.default ?? false;
  return new FlagDefinition({
    name,
    description,
    kind: 'boolean',
    required: options.required,
    defaultValue: String(defaultValue),
    bind: (program) => {
      program.addOption(new Option(`--${name}`, description).default(defaultValue));
    },
  });
}

function scalarFlag<T extends FlagValue>(
  kind: FlagKind,
  name: string,
  description: string,
  options: FlagOptions<T>,
  parse: (raw: string) => T,
  render: (value: T) => string
): FlagDefinition {
  const { default: defaultValue } = options;
  return new FlagDefinition({
    name,
    description,
    kind,
    required: options.required,
    defaultValue: defaultValue === undefined ? '' : render(defaultValue),
    bind: (program) => {
      const option = new Option(`--${name} <${kind}>`, description).argParser((raw: string) => parse(raw));
      if (defaultValue !== undefined) {
        option.default(defaultValue, render(defaultValue));
      }
      program.addOption(option);
    },
  });
}

export function parseInteger(raw: string): number {
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError('Integer out of range.');
  }
  return value;
}

export function parseFloatValue(raw: string): number {
  const value = raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return value;
}

const DURATION_UNITS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
};

const DURATION_PATTERN = /^[+-]?(\d*\.?\d+(ms|h|m|s))+$/;
const DURATION_PART = /(\d*\.?\d+)(ms|h|m|s)/g;

export function parseDuration(raw: string): number {
  const text = raw.trim();
  if (text === '0') {
    return 0;
  }
  if (!DURATION_PATTERN.test(text)) {
    throw new InvalidArgumentError('Not a duration (expected e.g. 1h30m, 1.5s, 250ms).');
  }

  const sign = text.startsWith('-') ? -1 : 1;
  let total = 0;
  for (const [, amount, unit] of text.matchAll(DURATION_PART)) {
    total += Number(amount) * DURATION_UNITS[unit];
  }
  return sign * Math.round(total);
}

export function formatDuration(ms: number): string {
  if (ms === 0) {
    return '0s';
  }

  const sign = ms < 0 ? '-' : '';
  let rest = Math.abs(ms);
  if (rest < 1_000) {
    return `${sign}${rest}ms`;
  }

  const hours = Math.floor(rest / 3_600_000);
  rest -= hours * 3_600_000;
  const minutes = Math.floor(rest / 60_000);
  rest -= minutes * 60_000;

  let text = sign;
  if (hours > 0) {
    text += `${hours}h`;
  }
  if (hours > 0 || minutes > 0) {
    text += `${minutes}m`;
  }
  return `${text}${rest / 1_000}s`;
}
