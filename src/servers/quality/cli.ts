#!/usr/bin/env node
/**
 * CLI entry point for the protocol-qa-server.
 *
 * Usage:
 *   npx tsx src/servers/quality/cli.ts [--rules <path>] [--config <path>] [--debug]
 *
 * Or when compiled:
 *   node dist/servers/quality/cli.js [--rules <path>] [--config <path>] [--debug]
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { Logger } from '../../utils/logger.js';
import { loadQualityServerStartConfig, startQualityServer } from './server.js';

const HELP_TEXT = `
protocol-qa-server - MCP Server for protocol quality validation

Usage:
  protocol-qa-server [options]

Options:
  --rules, -r <path>   Rule catalog to load (default: paths.rules or the bundled catalog)
  --config, -c <path>  Config file (default: ./protocol-qa.toml)
  --debug, -d          Enable debug logging
  --help, -h           Show this help message

The rule catalog is loaded once at startup.

Tools provided:
  - validate_protocol: Validates all sections and returns the consolidated report
  - validate_section: Validates one section against its rule
  - check_timeline: Extracts timepoints from text and checks their order
  - get_section_rules: Returns the rule configured for a section
`;

interface ServerArgs {
  rulesPath: string | undefined;
  configPath: string | undefined;
  debug: boolean;
}

function parseArgs(): ServerArgs {
  const args = process.argv.slice(2);
  let rulesPath: string | undefined;
  let configPath: string | undefined;
  let debug = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--rules' || arg === '-r') {
      const next = args[i + 1];
      if (next !== undefined) {
        rulesPath = path.resolve(next);
        i++;
      }
    } else if (arg === '--config' || arg === '-c') {
      const next = args[i + 1];
      if (next !== undefined) {
        configPath = path.resolve(next);
        i++;
      }
    } else if (arg === '--debug' || arg === '-d') {
      debug = true;
    } else if (arg === '--help' || arg === '-h') {
      process.stdout.write(HELP_TEXT);
      process.exit(0);
    }
  }

  return { rulesPath, configPath, debug };
}

async function main(): Promise<void> {
  const args = parseArgs();
  const startConfig = await loadQualityServerStartConfig({
    ...(args.rulesPath !== undefined ? { rulesPath: args.rulesPath } : {}),
    ...(args.configPath !== undefined ? { configPath: args.configPath } : {}),
    debug: args.debug,
  });

  const logger = new Logger({
    component: 'quality-server',
    debugMode: startConfig.debug === true,
  });
  logger.debug('server_start', { rules: startConfig.rulesPath ?? '(bundled)' });

  await startQualityServer(startConfig);
}

main().catch((err: unknown) => {
  const errorMessage = err instanceof Error ? err.message : String(err);
  new Logger({ component: 'quality-server' }).error('startup_failed', {
    error: errorMessage,
  });
  process.exit(1);
});
