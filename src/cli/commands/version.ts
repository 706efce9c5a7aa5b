/**
 * Version command handler for the protocol-qa CLI.
 */

import { getVersion } from '../../utils/version.js';
import type { CliCommandResult } from '../types.js';

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`protocol-qa v${getVersion()}`);
  return { exitCode: 0 };
}
