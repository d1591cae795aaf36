/**
 * Argument parsing for the generate command.
 *
 * @packageDocumentation
 */

/**
 * Error raised for malformed command-line arguments.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parsed generate options. Unset fields fall back to env, file and defaults.
 */
export interface GenerateOptions {
  /** Cluster name from `--name`. */
  name?: string;
  /** Output root from `--output`. */
  output?: string;
  /** Inventory file from `--inventory`. */
  inventory?: string;
  /** Config file from `--config`. */
  config?: string;
  /** `--debug` was given. */
  debug: boolean;
  /** `--help` was given. */
  help: boolean;
  /** Positional node addresses in order. */
  addresses: string[];
}

type ValueFlag = 'name' | 'output' | 'inventory' | 'config';

const VALUE_FLAGS: ReadonlyMap<string, ValueFlag> = new Map([
  ['--name', 'name'],
  ['-n', 'name'],
  ['--output', 'output'],
  ['-o', 'output'],
  ['--inventory', 'inventory'],
  ['-i', 'inventory'],
  ['--config', 'config'],
  ['-c', 'config'],
]);

/**
 * Parses `generate` arguments.
 *
 * Value flags accept `--flag value` and `--flag=value`. Everything after
 * `--` is positional.
 *
 * @param args - Arguments following the command name.
 * @returns The parsed options.
 * @throws UsageError for unknown flags, flags without a value, or no addresses.
 *
 * @example
 * ```typescript
 * parseGenerateArgs(['-n', 'foo', '10.0.0.1', '10.0.0.2']);
 * // { name: 'foo', debug: false, help: false, addresses: ['10.0.0.1', '10.0.0.2'] }
 * ```
 */
export function parseGenerateArgs(args: readonly string[]): GenerateOptions {
  const options: GenerateOptions = { debug: false, help: false, addresses: [] };
  let positionalOnly = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    if (positionalOnly || !arg.startsWith('-') || arg === '-') {
      options.addresses.push(arg);
      continue;
    }

    if (arg === '--') {
      positionalOnly = true;
      continue;
    }
    if (arg === '--debug') {
      options.debug = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const field = VALUE_FLAGS.get(flag);
    if (field === undefined) {
      throw new UsageError(`Unknown option: ${flag}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new UsageError(`Option ${flag} requires a value`);
    }

    options[field] = value;
  }

  if (!options.help && options.addresses.length === 0) {
    throw new UsageError('At least one node address is required');
  }

  return options;
}
