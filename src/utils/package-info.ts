import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

// src/utils and dist/utils both sit two levels below the package root
const PACKAGE_JSON_PATH = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');

/**
 * Version from package.json, or undefined when it cannot be read
 */
export function readPackageVersion(): string | undefined {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      const { version } = packageJson;
      return typeof version === 'string' ? version : undefined;
    }
  } catch {
    // Not installed from a package (e.g. a bare copy of dist/)
  }
  return undefined;
}
