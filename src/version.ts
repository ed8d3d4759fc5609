/**
 * Centralized version management.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { readFileSync } from 'fs';

/**
 * Read the package version from npm's environment or from package.json
 * beside the module (src/ and dist/ both sit one level below it).
 */
function getPackageVersion(): string {
  if (process.env.npm_package_name === PACKAGE_NAME && process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // Bundled or relocated: fall through to the literal
  }
  return '0.1.0';
}

export const PACKAGE_NAME = 'authbroker';

export const VERSION = getPackageVersion();

/**
 * User-Agent string for HTTP requests.
 */
export const USER_AGENT = `${PACKAGE_NAME}/${VERSION}`;
