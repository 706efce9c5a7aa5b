/**
 * Argument parsing shared by CLI commands.
 */

/**
 * Thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Options a command accepts.
 */
export interface ArgSpec {
  /** Options that take a value, e.g. `--format json` or `--format=json`. */
  readonly valueOptions?: readonly string[];
  /** Boolean options, e.g. `--no-color`. */
  readonly flagOptions?: readonly string[];
}

/**
 * Parsed command-line arguments.
 */
export interface ParsedArgs {
  /** Arguments that are not options, in order. */
  positionals: string[];
  /** Values of value options; the last occurrence wins. */
  values: Map<string, string>;
  /** Flags that were present. */
  flags: Set<string>;
}

/**
 * Parses the arguments following a command name.
 *
 * A lone `--` ends option parsing.
 *
 * @param args - Raw arguments.
 * @param spec - Accepted options.
 * @returns Positionals, option values and flags.
 * @throws CliUsageError for an unknown option or a missing value.
 *
 * @example
 * ```typescript
 * const parsed = parseArgs(['doc.json', '--format', 'json'], { valueOptions: ['--format'] });
 * parsed.positionals; // ['doc.json']
 * parsed.values.get('--format'); // 'json'
 * ```
 */
export function parseArgs(args: readonly string[], spec: ArgSpec): ParsedArgs {
  const valueOptions = spec.valueOptions ?? [];
  const flagOptions = spec.flagOptions ?? [];
  const result: ParsedArgs = { positionals: [], values: new Map(), flags: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === '--') {
      result.positionals.push(...args.slice(i + 1));
      break;
    }

    if (!arg.startsWith('-') || arg === '-') {
      result.positionals.push(arg);
      continue;
    }

    const equals = arg.indexOf('=');
    const name = equals === -1 ? arg : arg.slice(0, equals);

    if (valueOptions.includes(name)) {
      if (equals !== -1) {
        result.values.set(name, arg.slice(equals + 1));
        continue;
      }
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`Option ${name} requires a value`);
      }
      result.values.set(name, next);
      i++;
      continue;
    }

    if (flagOptions.includes(name) && equals === -1) {
      result.flags.add(name);
      continue;
    }

    throw new CliUsageError(`Unknown option: ${arg}`);
  }

  return result;
}
