/**
 * Application wiring for the protocol-qa CLI.
 *
 * Builds the command context and dispatches to command handlers.
 */

import type { EnvRecord } from '../config/index.js';
import { handleRulesCommand } from './commands/rules.js';
import { handleTimelineCommand } from './commands/timeline.js';
import { handleVersionCommand } from './commands/version.js';
import { handleValidateCommand } from './commands/validate.js';
import { getCommandHelp, getHelpText } from './help.js';
import { getVersion } from '../utils/version.js';
import type { CliCommandHandler, CliCommandResult, CliConfig, CliContext } from './types.js';
import { executeCommand } from './utils/errorHandling.js';

/**
 * Process-level inputs for {@link createCliApp}.
 */
export interface CliAppOptions {
  /** Arguments following the command name. */
  args?: string[];
  /** Working directory (defaults to process.cwd()). */
  cwd?: string;
  /** Environment (defaults to process.env). */
  env?: EnvRecord;
  /** Receives structured log lines. */
  logSink?: (line: string) => void;
}

/**
 * Creates and initializes CLI application context.
 *
 * Colors default to on unless `NO_COLOR` is set in the environment.
 *
 * @param config - CLI configuration options.
 * @param options - Arguments, working directory and environment.
 * @returns The CLI context.
 */
export function createCliApp(
  config: Partial<CliConfig> = {},
  options: CliAppOptions = {}
): CliContext {
  const env = options.env ?? process.env;
  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== '';

  const context: CliContext = {
    args: options.args ?? [],
    cwd: options.cwd ?? process.cwd(),
    env,
    config: {
      colors: config.colors ?? !noColor,
      unicode: config.unicode ?? true,
    },
  };
  if (options.logSink !== undefined) {
    context.logSink = options.logSink;
  }
  return context;
}

const COMMANDS: ReadonlyMap<string, CliCommandHandler> = new Map([
  ['validate', handleValidateCommand],
  ['rules', handleRulesCommand],
  ['timeline', handleTimelineCommand],
]);

/**
 * Runs one CLI invocation and returns its result without exiting.
 *
 * @param argv - Arguments after the executable, e.g. `['validate', 'doc.json']`.
 * @param options - Working directory, environment and log sink.
 * @returns The command result; errors are printed and mapped to exit code 1.
 *
 * @example
 * ```typescript
 * const result = await runCli(['validate', 'protocol.json', '--no-color']);
 * result.exitCode; // 0, 1 or 2
 * ```
 */
export async function runCli(
  argv: readonly string[],
  options: Omit<CliAppOptions, 'args'> = {}
): Promise<CliCommandResult> {
  const command = argv[0] ?? '';
  const commandArgs = argv.slice(1);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic === undefined) {
        console.log(getHelpText(getVersion()));
        return { exitCode: 0 };
      }
      return showHelpForCommand(topic);
    }

    case 'version':
    case '--version':
    case '-v':
      return handleVersionCommand();

    default:
      break;
  }

  const handler = COMMANDS.get(command);
  if (handler === undefined) {
    console.error(`Error: Unknown command: ${command}`);
    console.error('\nRun "pqa help" for usage information.');
    return { exitCode: 1 };
  }

  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    return showHelpForCommand(command);
  }

  const context = createCliApp(
    commandArgs.includes('--no-color') ? { colors: false } : {},
    { ...options, args: commandArgs }
  );

  return executeCommand(() => handler(context), {
    command,
    display: context.config,
  });
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): CliCommandResult {
  const help = getCommandHelp(commandName);
  if (help !== undefined) {
    console.log(help);
    return { exitCode: 0 };
  }
  console.error(`Unknown command: ${commandName}`);
  console.error('\nRun "pqa help" to see all available commands.');
  return { exitCode: 1 };
}
