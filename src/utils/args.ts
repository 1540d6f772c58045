import { ConfigError } from '../core/errors';

export type OptionValue = string | string[] | boolean;
export type ParsedOptions = Record<string, OptionValue>;

export interface ParsedArgs {
  command: string | null;
  positionals: string[];
  options: ParsedOptions;
}

const NEGATION_PREFIX = 'no-';

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const options: ParsedOptions = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }

    let key = token.slice(2);
    let inline: string | undefined;
    const eq = key.indexOf('=');
    if (eq >= 0) {
      inline = key.slice(eq + 1);
      key = key.slice(0, eq);
    }

    // --no-lint is the same as --lint false.
    if (inline === undefined && key.startsWith(NEGATION_PREFIX)) {
      options[key.slice(NEGATION_PREFIX.length)] = false;
      continue;
    }

    let value: string | boolean = true;
    if (inline !== undefined) {
      value = inline;
    } else {
      const next = rest[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i += 1;
      }
    }

    const current = options[key];
    if (current === undefined || typeof current === 'boolean') {
      options[key] = value;
    } else if (Array.isArray(current)) {
      current.push(String(value));
    } else {
      options[key] = [current, String(value)];
    }
  }

  return {
    command: command ?? null,
    positionals,
    options,
  };
}

export function readStringOption(options: ParsedOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined || typeof value === 'boolean') {
    return undefined;
  }
  return Array.isArray(value) ? value[value.length - 1] : value;
}

export function readStringArrayOption(options: ParsedOptions, key: string): string[] {
  const value = options[key];
  if (value === undefined || typeof value === 'boolean') {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** Repeated flags and comma separated values both add to the list. */
export function readCsvOption(options: ParsedOptions, key: string): string[] {
  return readStringArrayOption(options, key)
    .flatMap((value) => value.split(','))
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function readBooleanOption(options: ParsedOptions, key: string, fallback = false): boolean {
  const value = options[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  const last = (Array.isArray(value) ? value[value.length - 1] : value).toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(last)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(last)) {
    return false;
  }
  throw new ConfigError(`--${key} expects a boolean, got "${last}"`);
}

function readInteger(options: ParsedOptions, key: string, min: number): number | undefined {
  const value = readStringOption(options, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`--${key} expects an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export function readIntOption(options: ParsedOptions, key: string, fallback: number): number {
  return readInteger(options, key, 1) ?? fallback;
}

export function readOptionalIntOption(options: ParsedOptions, key: string): number | undefined {
  return readInteger(options, key, 1);
}

export function readNonNegativeIntOption(options: ParsedOptions, key: string): number | undefined {
  return readInteger(options, key, 0);
}

export function readEnumOption<T extends string>(
  options: ParsedOptions,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = readStringOption(options, key);
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigError(`--${key} must be one of ${allowed.join(', ')}, got "${value}"`);
  }
  return match;
}

/** Like readBooleanOption, but leaves an absent flag undefined so config files can decide. */
export function readOptionalBooleanOption(options: ParsedOptions, key: string): boolean | undefined {
  return options[key] === undefined ? undefined : readBooleanOption(options, key);
}
