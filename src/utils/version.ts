/**
 * Package version, read from package.json.
 *
 * The path is the same from src/utils and dist/utils, so this works both
 * from sources and from the build.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { safeReadFileSync } from './safe-fs.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PACKAGE_JSON_PATH = join(__dirname, '../../package.json');

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersion(): string {
  let packageJson: unknown;
  try {
    packageJson = JSON.parse(safeReadFileSync(PACKAGE_JSON_PATH, 'utf-8'));
  } catch {
    return '(unknown)';
  }
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '(unknown)';
}
