/**
 * Types for the protocol-qa quality MCP server.
 *
 * @packageDocumentation
 */

import type {
  DuplicationOptions,
  Issue,
  SerializedProtocolReport,
  SerializedSectionResult,
  TimelineMention,
} from '../../quality/index.js';
import type { EnvRecord } from '../../config/index.js';
import type { RuleDescription, RuleRegistry } from '../../rules/index.js';

/**
 * Names of the tools the server provides.
 */
export const QUALITY_TOOL_NAMES = [
  'validate_protocol',
  'validate_section',
  'check_timeline',
  'get_section_rules',
] as const;

/**
 * A tool name.
 */
export type QualityToolName = (typeof QUALITY_TOOL_NAMES)[number];

/**
 * Configuration for {@link createQualityServer}.
 */
export interface QualityServerConfig {
  /** The rule registry, loaded once before the server is created. */
  registry: RuleRegistry;
  /** Duplication thresholds for validate_protocol. */
  duplication?: DuplicationOptions;
  /** Enable debug logging. */
  debug?: boolean;
  /** Receives log lines (defaults to stderr). */
  logSink?: (line: string) => void;
}

/**
 * Configuration for {@link startQualityServer}.
 */
export interface QualityServerStartConfig {
  /** Rule catalog to load. Defaults to the bundled catalog. */
  rulesPath?: string;
  /** Duplication thresholds for validate_protocol. */
  duplication?: DuplicationOptions;
  /** Enable debug logging. */
  debug?: boolean;
}

/**
 * Options of the protocol-qa-server entry point.
 */
export interface QualityServerLaunchOptions {
  /** `--rules`: catalog to load instead of `paths.rules`. */
  rulesPath?: string;
  /** `--config`: config file instead of `./protocol-qa.toml`. */
  configPath?: string;
  /** `--debug`. */
  debug?: boolean;
  /** Directory relative paths resolve against (defaults to process.cwd()). */
  cwd?: string;
  /** Environment for overrides (defaults to process.env). */
  env?: EnvRecord;
}

/**
 * Arguments of validate_protocol.
 */
export interface ValidateProtocolArgs {
  sections: Record<string, string>;
  study_type: string;
}

/**
 * Arguments of validate_section.
 */
export interface ValidateSectionArgs {
  section: string;
  text: string;
  study_type: string;
}

/**
 * Arguments of check_timeline.
 */
export interface CheckTimelineArgs {
  text: string;
}

/**
 * Arguments of get_section_rules.
 */
export interface GetSectionRulesArgs {
  section: string;
  study_type?: string;
}

/**
 * Result of validate_protocol.
 */
export type ValidateProtocolResult = SerializedProtocolReport;

/**
 * Result of validate_section.
 */
export interface ValidateSectionResult {
  section: string;
  studyType: string;
  result: SerializedSectionResult;
}

/**
 * Result of check_timeline.
 */
export interface CheckTimelineResult {
  mentions: TimelineMention[];
  issues: Issue[];
}

/**
 * Result of get_section_rules.
 */
export interface GetSectionRulesResult {
  section: string;
  /** False when the catalog has no rule for the section; `rules` is then empty. */
  configured: boolean;
  rules: RuleDescription;
}

/**
 * Error thrown when tool arguments do not match the tool's input schema.
 */
export class ToolArgumentError extends Error {
  /** The tool that was called. */
  public readonly tool: string;
  /** Schema validation messages. */
  public readonly errors: readonly string[];

  constructor(tool: string, errors: readonly string[]) {
    super(`Invalid arguments for ${tool}: ${errors.join('; ')}`);
    this.name = 'ToolArgumentError';
    this.tool = tool;
    this.errors = errors;
  }
}

/**
 * Error thrown for an unknown tool name.
 */
export class UnknownToolError extends Error {
  /** The requested tool name. */
  public readonly tool: string;

  constructor(tool: string) {
    super(`Unknown tool: ${tool}`);
    this.name = 'UnknownToolError';
    this.tool = tool;
  }
}
