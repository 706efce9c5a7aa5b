/**
 * Environment variable overrides for configuration.
 *
 * Provides support for PROTOCOL_QA_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isOutputFormat, OUTPUT_FORMATS, type Config, type PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToOutputFormat(value: string, envVar: string): Config['output']['format'] {
  const trimmed = value.trim().toLowerCase();
  if (!isOutputFormat(trimmed)) {
    throw new EnvCoercionError(
      envVar,
      value,
      'output format',
      `Cannot coerce '${envVar}' value '${value}' to an output format. Expected one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return trimmed;
}

/**
 * How one environment variable maps onto the configuration.
 */
interface EnvVarMapping {
  readonly description: string;
  readonly type: 'string' | 'number' | 'boolean' | 'format';
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: PROTOCOL_QA_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * Shortcuts are provided for the common ones (e.g., PROTOCOL_QA_RULES).
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  PROTOCOL_QA_RULES: {
    description: 'Override the rule catalog path (shortcut for PROTOCOL_QA_PATHS_RULES)',
    type: 'string',
    apply: (overrides, value) => {
      overrides.paths = { ...overrides.paths, rules: value };
    },
  },
  PROTOCOL_QA_PATHS_RULES: {
    description: 'Override the rule catalog path',
    type: 'string',
    apply: (overrides, value) => {
      overrides.paths = { ...overrides.paths, rules: value };
    },
  },
  PROTOCOL_QA_DUPLICATION_THRESHOLD: {
    description: 'Override the duplication threshold for ordinary section pairs',
    type: 'number',
    apply: (overrides, value, envVar) => {
      overrides.duplication = { ...overrides.duplication, threshold: coerceToNumber(value, envVar) };
    },
  },
  PROTOCOL_QA_DUPLICATION_LEAD_SECTION: {
    description: 'Override the lead section name (default: synopsis)',
    type: 'string',
    apply: (overrides, value) => {
      overrides.duplication = { ...overrides.duplication, lead_section: value };
    },
  },
  PROTOCOL_QA_DUPLICATION_LEAD_SECTION_THRESHOLD: {
    description: 'Override the duplication threshold for pairs involving the lead section',
    type: 'number',
    apply: (overrides, value, envVar) => {
      overrides.duplication = {
        ...overrides.duplication,
        lead_section_threshold: coerceToNumber(value, envVar),
      };
    },
  },
  PROTOCOL_QA_OUTPUT_FORMAT: {
    description: 'Override the report format (text, json)',
    type: 'format',
    apply: (overrides, value, envVar) => {
      overrides.output = { ...overrides.output, format: coerceToOutputFormat(value, envVar) };
    },
  },
  PROTOCOL_QA_OUTPUT_COLORS: {
    description: 'Enable or disable ANSI colors (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.output = { ...overrides.output, colors: coerceToBoolean(value, envVar) };
    },
  },
  PROTOCOL_QA_DEBUG: {
    description: 'Enable debug logging (shortcut for PROTOCOL_QA_LOGGING_DEBUG)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
  PROTOCOL_QA_LOGGING_DEBUG: {
    description: 'Enable debug logging',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Full-path variables are read after their shortcuts, so
 * PROTOCOL_QA_PATHS_RULES wins over PROTOCOL_QA_RULES when both are set.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ PROTOCOL_QA_OUTPUT_FORMAT: 'json' });
 * result.overrides; // { output: { format: 'json' } }
 * result.appliedVars; // ['PROTOCOL_QA_OUTPUT_FORMAT']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    paths: { ...base.paths, ...partial.paths },
    duplication: { ...base.duplication, ...partial.duplication },
    output: { ...base.output, ...partial.output },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(tomlContent));
 * // PROTOCOL_QA_DUPLICATION_THRESHOLD=0.7 overrides [duplication] threshold
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
