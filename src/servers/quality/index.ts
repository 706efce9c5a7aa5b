/**
 * Protocol quality MCP server package.
 *
 * Exposes protocol validation, section validation, timeline checks and
 * rule lookups as MCP tools over a registry loaded once at startup.
 *
 * @packageDocumentation
 */

export {
  createQualityServer,
  createQualityServerFromCatalog,
  loadQualityServerStartConfig,
  startQualityServer,
  SERVER_NAME,
} from './server.js';
export {
  QUALITY_TOOL_NAMES,
  ToolArgumentError,
  UnknownToolError,
  type CheckTimelineArgs,
  type CheckTimelineResult,
  type GetSectionRulesArgs,
  type GetSectionRulesResult,
  type QualityServerConfig,
  type QualityServerLaunchOptions,
  type QualityServerStartConfig,
  type QualityToolName,
  type ValidateProtocolArgs,
  type ValidateProtocolResult,
  type ValidateSectionArgs,
  type ValidateSectionResult,
} from './types.js';
