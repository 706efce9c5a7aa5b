/**
 * Configuration module for protocol-qa.toml parsing and validation.
 *
 * Provides typed configuration parsing with sensible defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, loadConfig, parseConfig } from './parser.js';
export type { LoadConfigOptions } from './parser.js';
export type {
  Config,
  DuplicationConfig,
  LoggingConfig,
  OutputConfig,
  OutputFormat,
  PartialConfig,
  PathConfig,
} from './types.js';
export { isOutputFormat, OUTPUT_FORMATS } from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DUPLICATION,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_PATHS,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidationError,
  ValidationResult,
  ValidateConfigOptions,
} from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
