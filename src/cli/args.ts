// src/cli/args.ts
import type { RunConfigInput } from '../config.js';
import { ConfigurationError } from '../errors.js';

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
}

export interface CliOptions {
  config: RunConfigInput;
  json: boolean;
  help: boolean;
}

const BOOLEAN_FLAGS = new Set(['json', 'help']);
const VALUE_FLAGS = new Set(['max_shift_days', 'seed', 'date_format', 'encoding']);

// --max-shift-days and --max_shift_days are the same flag
const normalizeKey = (key: string) => key.replace(/-/g, '_');

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq > 2) {
      flags[normalizeKey(arg.slice(2, eq))] = arg.slice(eq + 1);
      continue;
    }

    const key = normalizeKey(arg.slice(2));
    const next = argv[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  return { positional, flags };
}

function parseInteger(name: string, value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`--${name} must be an integer, got "${value}".`);
  }
  return Number(value);
}

/** Turn parsed argv into run options. Range checks are left to the config schema. */
export function toCliOptions({ positional, flags }: ParsedArgs): CliOptions {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(flags)) {
    if (BOOLEAN_FLAGS.has(key)) continue;
    if (!VALUE_FLAGS.has(key)) {
      throw new ConfigurationError(`Unknown option: --${key}`);
    }
    if (typeof value !== 'string') {
      throw new ConfigurationError(`--${key} requires a value.`);
    }
    values[key] = value;
  }

  const help = flags.help === true;
  const [inputFile = '', outputFile = '', ...extra] = positional;
  if (!help && (!inputFile || !outputFile)) {
    throw new ConfigurationError('Input and output files required. Usage: dateshift <input_file> <output_file> [options]');
  }
  if (extra.length > 0) {
    throw new ConfigurationError(`Unexpected argument: ${extra[0]}`);
  }

  return {
    config: {
      inputFile,
      outputFile,
      maxShiftDays: values.max_shift_days !== undefined ? parseInteger('max_shift_days', values.max_shift_days) : undefined,
      seed: values.seed !== undefined ? parseInteger('seed', values.seed) : undefined,
      dateFormat: values.date_format,
      encoding: values.encoding,
    },
    json: flags.json === true,
    help,
  };
}
