/**
 * CLI types and interfaces for the protocol-qa CLI.
 */

import type { EnvRecord } from '../config/index.js';

/**
 * Configuration options for the CLI application.
 */
export interface CliConfig {
  /**
   * Whether to use colors in output.
   */
  colors: boolean;

  /**
   * Whether to use Unicode box-drawing characters.
   */
  unicode: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments following the command name.
   */
  args: string[];

  /**
   * Directory that relative paths resolve against.
   */
  cwd: string;

  /**
   * Environment used for configuration overrides.
   */
  env: EnvRecord;

  /**
   * CLI configuration.
   */
  config: CliConfig;

  /**
   * Receives structured log lines (defaults to stderr).
   */
  logSink?: (line: string) => void;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code: 0 for success, 1 for errors, 2 when a protocol is not
   * guideline-adherent or has timeline issues.
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
