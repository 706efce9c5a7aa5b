/**
 * TOML configuration parser for protocol-qa.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import * as path from 'node:path';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DUPLICATION,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_PATHS,
} from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  type Config,
  type DuplicationConfig,
  type LoggingConfig,
  type OutputConfig,
  type PathConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawTable = Record<string, unknown>;

function isTable(value: unknown): value is RawTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an optional sub-table.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function readTable(parent: RawTable, key: string): RawTable | undefined {
  if (!(key in parent)) {
    return undefined;
  }
  const value = parent[key];
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${key}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function parsePaths(raw: RawTable | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('rules' in raw) {
    result.rules = validateString(raw.rules, 'paths.rules');
  }

  return result;
}

function parseDuplication(raw: RawTable | undefined): DuplicationConfig {
  const result: DuplicationConfig = { ...DEFAULT_DUPLICATION };
  if (raw === undefined) {
    return result;
  }

  if ('threshold' in raw) {
    result.threshold = validateNumber(raw.threshold, 'duplication.threshold');
  }
  if ('lead_section' in raw) {
    result.lead_section = validateString(raw.lead_section, 'duplication.lead_section');
  }
  if ('lead_section_threshold' in raw) {
    result.lead_section_threshold = validateNumber(
      raw.lead_section_threshold,
      'duplication.lead_section_threshold'
    );
  }

  return result;
}

function parseOutput(raw: RawTable | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('format' in raw) {
    const format = validateString(raw.format, 'output.format');
    if (!isOutputFormat(format)) {
      throw new ConfigParseError(
        `Invalid value for 'output.format': expected ${OUTPUT_FORMATS.map((f) => `'${f}'`).join(' or ')}, got '${format}'`
      );
    }
    result.format = format;
  }
  if ('colors' in raw) {
    result.colors = validateBoolean(raw.colors, 'output.colors');
  }

  return result;
}

function parseLogging(raw: RawTable | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [duplication]
 * threshold = 0.7
 *
 * [output]
 * format = "json"
 * `);
 * config.duplication.threshold; // 0.7
 * config.duplication.lead_section; // "synopsis"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawTable;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    paths: parsePaths(readTable(parsed, 'paths')),
    duplication: parseDuplication(readTable(parsed, 'duplication')),
    output: parseOutput(readTable(parsed, 'output')),
    logging: parseLogging(readTable(parsed, 'logging')),
  };
}

/**
 * Returns a copy of the default configuration.
 *
 * @example
 * ```typescript
 * getDefaultConfig().output.format; // "text"
 * ```
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    duplication: { ...DEFAULT_CONFIG.duplication },
    output: { ...DEFAULT_CONFIG.output },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /**
   * Config file to read. When omitted, `protocol-qa.toml` in `cwd` is read
   * if it exists and defaults are used otherwise.
   */
  configPath?: string;
  /** Directory used to find the default config file. */
  cwd?: string;
  /** Environment for overrides (defaults to process.env). */
  env?: EnvRecord;
}

/**
 * Loads configuration with precedence env > file > defaults.
 *
 * A relative `paths.rules` in the file is resolved against the file's
 * directory.
 *
 * @param options - Where to look and which environment to apply.
 * @returns The merged configuration.
 * @throws ConfigParseError if an explicitly named file is missing or invalid.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let config = getDefaultConfig();

  if (await safeExists(configPath)) {
    let content: string;
    try {
      content = await safeReadFile(configPath, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(`Failed to read config file ${configPath}: ${cause.message}`, cause);
    }
    config = parseConfig(content);
    if (config.paths.rules !== undefined) {
      config.paths.rules = path.resolve(path.dirname(configPath), config.paths.rules);
    }
  } else if (explicit) {
    throw new ConfigParseError(`Config file not found: ${configPath}`);
  }

  return applyEnvOverrides(config, options.env);
}
