/**
 * Configuration types for protocol-qa.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Report output formats supported by the CLI.
 */
export type OutputFormat = 'text' | 'json';

/**
 * All output formats.
 */
export const OUTPUT_FORMATS: readonly OutputFormat[] = Object.freeze(['text', 'json'] as const);

/**
 * Path configuration.
 */
export interface PathConfig {
  /**
   * Rule catalog to load. Relative paths in a config file resolve against
   * the file's directory. When unset, the bundled catalog is used.
   */
  rules?: string;
}

/**
 * Duplication detector settings.
 */
export interface DuplicationConfig {
  /** Overlap above which two ordinary sections are flagged (default: 0.6). */
  threshold: number;
  /** Section that summarizes the others (default: "synopsis"). */
  lead_section: string;
  /** Overlap above which a pair involving the lead section is flagged (default: 0.8). */
  lead_section_threshold: number;
}

/**
 * Report output settings.
 */
export interface OutputConfig {
  /** Report format. */
  format: OutputFormat;
  /** Whether to use ANSI colors in text output. */
  colors: boolean;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level log entries. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from protocol-qa.toml.
 */
export interface Config {
  /** Path configuration. */
  paths: PathConfig;
  /** Duplication thresholds. */
  duplication: DuplicationConfig;
  /** Report output settings. */
  output: OutputConfig;
  /** Logging settings. */
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  duplication?: Partial<DuplicationConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Type guard for OutputFormat values.
 *
 * @param value - Value to check.
 */
export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
