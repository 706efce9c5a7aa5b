/**
 * Tests for protocol-qa-server.
 *
 * @packageDocumentation
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

import { ConfigValidationError } from '../../config/index.js';
import { loadRuleRegistryOrThrow, type RuleRegistry } from '../../rules/index.js';
import { getVersion } from '../../utils/version.js';
import { createQualityServer, loadQualityServerStartConfig } from './server.js';
import type { QualityServerConfig } from './types.js';

interface ToolCallResult {
  text: string;
  isError: boolean;
}

// Helper to extract the first text block of a tool result
async function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<ToolCallResult> {
  const result = await client.callTool({ name, arguments: args });
  const content: unknown = result.content;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  if (
    typeof first !== 'object' ||
    first === null ||
    !('text' in first) ||
    typeof first.text !== 'string'
  ) {
    throw new Error('No text content in result');
  }
  return { text: first.text, isError: result.isError === true };
}

async function callToolJson(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<unknown> {
  const result = await callTool(client, name, args);
  expect(result.isError).toBe(false);
  return JSON.parse(result.text);
}

async function callToolError(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<unknown> {
  const result = await callTool(client, name, args);
  expect(result.isError).toBe(true);
  const body: unknown = JSON.parse(result.text);
  return typeof body === 'object' && body !== null && 'error' in body ? body.error : undefined;
}

// Helper to create a connected server-client pair
async function createConnectedPair(config: QualityServerConfig): Promise<{ client: Client }> {
  const server = createQualityServer(config);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  const client = new Client({ name: 'test-client', version: '1.0.0' }, {});

  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

  return { client };
}

describe('protocol-qa-server', () => {
  let registry: RuleRegistry;
  let client: Client;

  beforeAll(async () => {
    registry = await loadRuleRegistryOrThrow();
  });

  beforeEach(async () => {
    ({ client } = await createConnectedPair({ registry }));
  });

  describe('tool listing', () => {
    it('should report the package version to clients', () => {
      expect(client.getServerVersion()).toEqual({
        name: 'protocol-qa-server',
        version: getVersion(),
      });
    });

    it('should list all quality tools', async () => {
      const result = await client.listTools();
      expect(result.tools.map((tool) => tool.name)).toEqual([
        'validate_protocol',
        'validate_section',
        'check_timeline',
        'get_section_rules',
      ]);
    });

    it('should publish required arguments in input schemas', async () => {
      const result = await client.listTools();
      const validateSection = result.tools.find((tool) => tool.name === 'validate_section');
      expect(validateSection?.inputSchema.required).toEqual(['section', 'text', 'study_type']);
    });
  });

  describe('validate_protocol', () => {
    it('should return the consolidated report', async () => {
      const report = await callToolJson(client, 'validate_protocol', {
        sections: { objectives: 'tbd' },
        study_type: 'phase2',
      });

      expect(report).toMatchObject({
        studyType: 'phase2',
        overallScore: 55,
        guidelineAdherence: false,
        perSection: { objectives: { score: 55 } },
        duplicationIssues: [],
        missingElements: [
          { section: 'objectives', element: 'primary_objective' },
          { section: 'objectives', element: 'secondary_objectives' },
        ],
      });
    });

    it('should report an empty protocol as adherent', async () => {
      const report = await callToolJson(client, 'validate_protocol', {
        sections: {},
        study_type: 'phase2',
      });

      expect(report).toEqual({
        studyType: 'phase2',
        overallScore: 100,
        guidelineAdherence: true,
        perSection: {},
        duplicationIssues: [],
        missingElements: [],
      });
    });

    it('should reject non-string section text', async () => {
      const error = await callToolError(client, 'validate_protocol', {
        sections: { objectives: 42 },
        study_type: 'phase2',
      });

      expect(error).toBe('Invalid arguments for validate_protocol: /sections/objectives: must be string');
    });
  });

  describe('validate_section', () => {
    it('should validate one section', async () => {
      const body = await callToolJson(client, 'validate_section', {
        section: 'objectives',
        text: 'tbd',
        study_type: 'phase2',
      });

      expect(body).toMatchObject({ section: 'objectives', studyType: 'phase2', result: { score: 55 } });
      const kinds =
        typeof body === 'object' && body !== null && 'result' in body
          ? JSON.stringify(body.result)
          : '';
      expect(kinds).toContain('"kind":"FORBIDDEN_TERM"');
    });

    it('should return a clean result for an unconfigured section', async () => {
      const body = await callToolJson(client, 'validate_section', {
        section: 'appendix',
        text: '',
        study_type: 'phase2',
      });

      expect(body).toEqual({
        section: 'appendix',
        studyType: 'phase2',
        result: { issues: [], warnings: [], suggestions: [], score: 100 },
      });
    });

    it('should reject missing arguments', async () => {
      const error = await callToolError(client, 'validate_section', {
        section: 'objectives',
        study_type: 'phase2',
      });

      expect(error).toBe(
        "Invalid arguments for validate_section: (root): must have required property 'text'"
      );
    });
  });

  describe('check_timeline', () => {
    it('should return mentions and ordering issues', async () => {
      const body = await callToolJson(client, 'check_timeline', {
        text: 'Labs 7 days prior to Visit 1. Consent 3 days prior to Visit 1.',
      });

      expect(body).toMatchObject({
        mentions: [
          { value: 7, unit: 'day', relation: 'prior to', referent: 'Visit', days: 7 },
          { value: 3, unit: 'day', relation: 'prior to', referent: 'Visit', days: 3 },
        ],
        issues: [{ kind: 'INCONSISTENCY', severity: 'MAJOR' }],
      });
    });

    it('should return nothing for text without timepoints', async () => {
      const body = await callToolJson(client, 'check_timeline', { text: 'No schedule.' });
      expect(body).toEqual({ mentions: [], issues: [] });
    });
  });

  describe('get_section_rules', () => {
    it('should narrow rules to a study type', async () => {
      const body = await callToolJson(client, 'get_section_rules', {
        section: 'safety',
        study_type: 'phase1',
      });

      expect(body).toEqual({
        section: 'safety',
        configured: true,
        rules: {
          requiredElements: ['adverse_event', 'reporting'],
          forbiddenTerms: ['tbd', 'to be determined', 'placeholder'],
          minLength: 200,
          studyTypeRequiredElements: { phase1: ['dose_limiting_toxicity', 'stopping_rules'] },
          requiredSubsections: {},
          studyTypeForbiddenTerms: {},
        },
      });
    });

    it('should report an unconfigured section', async () => {
      const body = await callToolJson(client, 'get_section_rules', { section: 'appendix' });

      expect(body).toMatchObject({ section: 'appendix', configured: false, rules: { minLength: 0 } });
    });
  });

  describe('errors and logging', () => {
    it('should return an error for an unknown tool', async () => {
      const error = await callToolError(client, 'nope', {});
      expect(error).toBe('Unknown tool: nope');
    });

    it('should log tool calls in debug mode', async () => {
      const lines: string[] = [];
      const { client: debugClient } = await createConnectedPair({
        registry,
        debug: true,
        logSink: (line) => {
          lines.push(line);
        },
      });

      await callToolJson(debugClient, 'check_timeline', { text: '' });

      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({
        level: 'debug',
        component: 'quality-server',
        event: 'tool_call',
        data: { name: 'check_timeline', args: { text: '' } },
      });
    });

    it('should log tool failures without debug mode', async () => {
      const lines: string[] = [];
      const { client: quietClient } = await createConnectedPair({
        registry,
        logSink: (line) => {
          lines.push(line);
        },
      });

      await callToolError(quietClient, 'nope', {});

      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({
        level: 'warn',
        component: 'quality-server',
        event: 'tool_failed',
        data: { name: 'nope', error: 'Unknown tool: nope' },
      });
    });
  });
});

describe('loadQualityServerStartConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pqa-server-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should use defaults without a config file', async () => {
    const startConfig = await loadQualityServerStartConfig({ cwd: tempDir, env: {} });

    expect(startConfig).toEqual({
      duplication: { threshold: 0.6, leadSection: 'synopsis', leadSectionThreshold: 0.8 },
      debug: false,
    });
  });

  it('should reject a duplication threshold of 1', async () => {
    await writeFile(join(tempDir, 'protocol-qa.toml'), '[duplication]\nthreshold = 1.0\n');

    await expect(loadQualityServerStartConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
      ConfigValidationError
    );
  });

  it('should reject a configured rules file that does not exist', async () => {
    await writeFile(join(tempDir, 'protocol-qa.toml'), '[paths]\nrules = "missing.toml"\n');

    await expect(loadQualityServerStartConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
      `paths.rules: Path does not exist: '${join(tempDir, 'missing.toml')}'`
    );
  });

  it('should let --rules override a missing configured rules file', async () => {
    await writeFile(join(tempDir, 'protocol-qa.toml'), '[paths]\nrules = "missing.toml"\n');

    const startConfig = await loadQualityServerStartConfig({
      cwd: tempDir,
      env: {},
      rulesPath: 'custom.toml',
      debug: true,
    });

    expect(startConfig.rulesPath).toBe(join(tempDir, 'custom.toml'));
    expect(startConfig.debug).toBe(true);
  });
});
