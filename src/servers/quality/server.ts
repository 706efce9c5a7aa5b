/**
 * Protocol quality MCP server.
 *
 * Exposes the validation engine as MCP tools. The rule registry is loaded
 * once at startup and shared by every call; calls never touch the
 * filesystem.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import * as path from 'node:path';

import { assertConfigValid, loadConfig } from '../../config/index.js';
import {
  checkMentionOrder,
  extractTimeline,
  serializeReport,
  serializeSectionResult,
  validateProtocol,
  validateSection,
} from '../../quality/index.js';
import { describeRule, loadRuleRegistryOrThrow, type RuleRegistry } from '../../rules/index.js';
import { Logger } from '../../utils/logger.js';
import { safeStatSync } from '../../utils/safe-fs.js';
import { getVersion } from '../../utils/version.js';
import {
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

/**
 * Name reported to MCP clients.
 */
export const SERVER_NAME = 'protocol-qa-server';

type ToolInputSchema = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
  additionalProperties: boolean;
};

interface ToolDefinition {
  name: QualityToolName;
  description: string;
  inputSchema: ToolInputSchema;
}

const STUDY_TYPE_PROPERTY = {
  type: 'string',
  minLength: 1,
  description: 'Study type selecting study-specific rules (e.g., "phase1", "observational")',
};

const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'validate_protocol',
    description:
      'Validates every section of a protocol against the rule catalog, checks timeline ' +
      'ordering and cross-section duplication, and returns the consolidated report.',
    inputSchema: {
      type: 'object',
      properties: {
        sections: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Section name to section text, in document order',
        },
        study_type: STUDY_TYPE_PROPERTY,
      },
      required: ['sections', 'study_type'],
      additionalProperties: false,
    },
  },
  {
    name: 'validate_section',
    description:
      'Validates one section against its rule: required elements, forbidden terms, ' +
      'study-type rules, minimum length and expected subsections.',
    inputSchema: {
      type: 'object',
      properties: {
        section: { type: 'string', description: 'Section name (e.g., "objectives")' },
        text: { type: 'string', description: 'Section text' },
        study_type: STUDY_TYPE_PROPERTY,
      },
      required: ['section', 'text', 'study_type'],
      additionalProperties: false,
    },
  },
  {
    name: 'check_timeline',
    description:
      'Extracts timepoints such as "14 days prior to randomization" from text and ' +
      'reports adjacent pairs that are out of chronological order.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to scan' },
      },
      required: ['text'],
      additionalProperties: false,
    },
  },
  {
    name: 'get_section_rules',
    description:
      'Returns the rule configured for a section, optionally narrowed to one study type.',
    inputSchema: {
      type: 'object',
      properties: {
        section: { type: 'string', description: 'Section name' },
        study_type: STUDY_TYPE_PROPERTY,
      },
      required: ['section'],
      additionalProperties: false,
    },
  },
];

interface ArgsValidator<T> {
  (data: unknown): data is T;
  errors?: ErrorObject[] | null;
}

function findSchema(name: QualityToolName): ToolInputSchema {
  const definition = TOOL_DEFINITIONS.find((tool) => tool.name === name);
  if (definition === undefined) {
    throw new UnknownToolError(name);
  }
  return definition.inputSchema;
}

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath === '' ? '(root)' : error.instancePath;
  return `${location}: ${error.message ?? 'Unknown error'}`;
}

/**
 * Creates and configures the protocol quality server.
 *
 * Note: We use the low-level Server class intentionally for compatibility
 * with manual request handling patterns.
 */
// eslint-disable-next-line @typescript-eslint/no-deprecated
export function createQualityServer(config: QualityServerConfig): Server {
  const { registry, duplication, debug = false, logSink } = config;

  const logger = new Logger(
    logSink !== undefined
      ? { component: 'quality-server', debugMode: debug, sink: logSink }
      : { component: 'quality-server', debugMode: debug }
  );

  const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => {
    compile: <T>(schema: Record<string, unknown>) => ArgsValidator<T>;
  })({
    allErrors: true,
  });

  const validators = {
    validate_protocol: ajv.compile<ValidateProtocolArgs>(findSchema('validate_protocol')),
    validate_section: ajv.compile<ValidateSectionArgs>(findSchema('validate_section')),
    check_timeline: ajv.compile<CheckTimelineArgs>(findSchema('check_timeline')),
    get_section_rules: ajv.compile<GetSectionRulesArgs>(findSchema('get_section_rules')),
  };

  function parseToolArgs<T>(tool: string, validate: ArgsValidator<T>, args: unknown): T {
    if (!validate(args)) {
      throw new ToolArgumentError(tool, (validate.errors ?? []).map(formatSchemaError));
    }
    return args;
  }

  // eslint-disable-next-line @typescript-eslint/no-deprecated
  const server = new Server(
    { name: SERVER_NAME, version: getVersion() },
    { capabilities: { tools: { listChanged: true } } }
  );

  // Handle tool listing
  server.setRequestHandler(ListToolsRequestSchema, () => {
    return Promise.resolve({
      tools: TOOL_DEFINITIONS.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    });
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, (request): Promise<CallToolResult> => {
    const { name, arguments: args = {} } = request.params;

    logger.debug('tool_call', { name, args });

    let response: CallToolResult;
    try {
      const result = dispatch(name, args);
      response = {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn('tool_failed', { name, error: errorMessage });
      response = {
        content: [{ type: 'text', text: JSON.stringify({ error: errorMessage }) }],
        isError: true,
      };
    }
    return Promise.resolve(response);
  });

  function dispatch(name: string, args: unknown): unknown {
    switch (name) {
      case 'validate_protocol':
        return handleValidateProtocol(parseToolArgs(name, validators.validate_protocol, args));
      case 'validate_section':
        return handleValidateSection(parseToolArgs(name, validators.validate_section, args));
      case 'check_timeline':
        return handleCheckTimeline(parseToolArgs(name, validators.check_timeline, args));
      case 'get_section_rules':
        return handleGetSectionRules(parseToolArgs(name, validators.get_section_rules, args));
      default:
        throw new UnknownToolError(name);
    }
  }

  /**
   * Handles the validate_protocol tool.
   */
  function handleValidateProtocol(args: ValidateProtocolArgs): ValidateProtocolResult {
    const report = validateProtocol(args.sections, args.study_type, registry, {
      ...(duplication !== undefined ? { duplication } : {}),
      logger,
    });
    return serializeReport(report);
  }

  /**
   * Handles the validate_section tool.
   */
  function handleValidateSection(args: ValidateSectionArgs): ValidateSectionResult {
    const result = validateSection(args.section, args.text, args.study_type, registry);
    return {
      section: args.section,
      studyType: args.study_type,
      result: serializeSectionResult(result),
    };
  }

  /**
   * Handles the check_timeline tool.
   */
  function handleCheckTimeline(args: CheckTimelineArgs): CheckTimelineResult {
    const mentions = extractTimeline(args.text);
    return { mentions, issues: checkMentionOrder(mentions) };
  }

  /**
   * Handles the get_section_rules tool.
   */
  function handleGetSectionRules(args: GetSectionRulesArgs): GetSectionRulesResult {
    return {
      section: args.section,
      configured: registry.hasRule(args.section),
      rules: describeRule(registry.rulesFor(args.section), args.study_type),
    };
  }

  return server;
}

/**
 * Loads and validates configuration for the server entry point.
 *
 * The catalog is chosen by `--rules`, then `paths.rules`, then the bundled
 * catalog. A configured `paths.rules` must exist unless `--rules` overrides it.
 *
 * @throws ConfigParseError, ConfigValidationError or EnvCoercionError for bad configuration.
 */
export async function loadQualityServerStartConfig(
  options: QualityServerLaunchOptions = {}
): Promise<QualityServerStartConfig> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig({
    cwd,
    ...(options.configPath !== undefined ? { configPath: options.configPath } : {}),
    ...(options.env !== undefined ? { env: options.env } : {}),
  });

  if (config.paths.rules !== undefined) {
    config.paths.rules = path.resolve(cwd, config.paths.rules);
  }
  if (options.rulesPath === undefined) {
    assertConfigValid(config, { pathChecker: (candidate) => safeStatSync(candidate) });
  } else {
    assertConfigValid(config);
  }

  const rulesPath =
    options.rulesPath !== undefined ? path.resolve(cwd, options.rulesPath) : config.paths.rules;

  return {
    ...(rulesPath !== undefined ? { rulesPath } : {}),
    duplication: {
      threshold: config.duplication.threshold,
      leadSection: config.duplication.lead_section,
      leadSectionThreshold: config.duplication.lead_section_threshold,
    },
    debug: options.debug === true || config.logging.debug,
  };
}

/**
 * Loads the rule catalog once and creates the server.
 *
 * @param config - Catalog path and server options.
 * @throws RuleCatalogLoadError if the catalog cannot be loaded.
 */
export async function createQualityServerFromCatalog(
  config: QualityServerStartConfig
): Promise<{ server: Server; registry: RuleRegistry }> {
  const registry = await loadRuleRegistryOrThrow(config.rulesPath);
  const server = createQualityServer({
    registry,
    ...(config.duplication !== undefined ? { duplication: config.duplication } : {}),
    debug: config.debug ?? false,
  });
  return { server, registry };
}

/**
 * Starts the quality server with stdio transport.
 * This is the main entry point when running as a standalone MCP server.
 */
export async function startQualityServer(config: QualityServerStartConfig): Promise<void> {
  const { server } = await createQualityServerFromCatalog(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
