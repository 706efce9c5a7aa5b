/**
 * Default configuration values for protocol-qa.toml.
 *
 * @packageDocumentation
 */

import type { Config, DuplicationConfig, LoggingConfig, OutputConfig, PathConfig } from './types.js';

/**
 * Default file name looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'protocol-qa.toml';

/**
 * Default path configuration: the bundled rule catalog.
 */
export const DEFAULT_PATHS: PathConfig = {};

/**
 * Default duplication thresholds.
 */
export const DEFAULT_DUPLICATION: DuplicationConfig = {
  threshold: 0.6,
  lead_section: 'synopsis',
  lead_section_threshold: 0.8,
};

/**
 * Default output configuration.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  format: 'text',
  colors: true,
};

/**
 * Default logging configuration.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  duplication: DEFAULT_DUPLICATION,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};
