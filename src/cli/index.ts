#!/usr/bin/env node

/**
 * protocol-qa CLI entry point.
 *
 * This is the main entry point for the 'pqa' CLI command.
 */

import { runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(() => runCli(process.argv.slice(2)));
