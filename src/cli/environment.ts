/**
 * Per-command loading of configuration, rule catalog and logger.
 *
 * Commands load the registry once and pass it explicitly to the engine.
 */

import * as path from 'node:path';
import { assertConfigValid, loadConfig, type Config } from '../config/index.js';
import { DEFAULT_RULES_PATH, loadRuleRegistryOrThrow, type RuleRegistry } from '../rules/index.js';
import { Logger } from '../utils/logger.js';
import { safeStatSync } from '../utils/safe-fs.js';
import type { CliContext } from './types.js';

/**
 * Everything a command needs after configuration and rules are loaded.
 */
export interface CommandEnvironment {
  /** Merged configuration (env > file > defaults). */
  config: Config;
  /** Absolute path of the loaded rule catalog. */
  rulesPath: string;
  /** The loaded rule registry. */
  registry: RuleRegistry;
  /** Logger for the command. */
  logger: Logger;
}

/**
 * Per-command overrides of configuration values.
 */
export interface CommandEnvironmentOptions {
  /** Config file named with `--config`. */
  configPath?: string | undefined;
  /** Rule catalog named with `--rules`. */
  rulesPath?: string | undefined;
  /** `--debug` was given. */
  debug?: boolean;
}

/**
 * Loads and validates configuration, then the rule catalog.
 *
 * The catalog is chosen by `--rules`, then `paths.rules`, then the bundled
 * catalog. Relative paths resolve against the context's working directory.
 *
 * @param context - The CLI context.
 * @param options - Per-command overrides.
 * @returns The loaded environment.
 * @throws ConfigParseError, ConfigValidationError or EnvCoercionError for bad configuration.
 * @throws RuleCatalogLoadError if the catalog cannot be loaded.
 */
export async function loadCommandEnvironment(
  context: CliContext,
  options: CommandEnvironmentOptions = {}
): Promise<CommandEnvironment> {
  const loadOptions =
    options.configPath !== undefined
      ? { configPath: options.configPath, cwd: context.cwd, env: context.env }
      : { cwd: context.cwd, env: context.env };
  const config = await loadConfig(loadOptions);

  if (config.paths.rules !== undefined) {
    config.paths.rules = path.resolve(context.cwd, config.paths.rules);
  }
  if (options.rulesPath === undefined) {
    assertConfigValid(config, { pathChecker: (candidate) => safeStatSync(candidate) });
  } else {
    assertConfigValid(config);
  }

  const rulesPath =
    options.rulesPath !== undefined
      ? path.resolve(context.cwd, options.rulesPath)
      : (config.paths.rules ?? DEFAULT_RULES_PATH);

  const logger = new Logger(
    context.logSink !== undefined
      ? {
          component: 'pqa',
          debugMode: options.debug === true || config.logging.debug,
          sink: context.logSink,
        }
      : { component: 'pqa', debugMode: options.debug === true || config.logging.debug }
  );

  const registry = await loadRuleRegistryOrThrow(rulesPath);
  logger.debug('rules_loaded', {
    source: registry.source,
    sections: registry.sectionNames().length,
  });

  return { config, rulesPath, registry, logger };
}
