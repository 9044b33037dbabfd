import { readFileSync } from 'fs';
import { join } from 'path';

const FALLBACK_VERSION = '0.1.0';

/**
 * Read the version from package.json.
 * Resolves from both src/utils (tests) and dist/utils (build) to the package root.
 */
function getPackageVersion(): string {
  try {
    const packagePath = join(__dirname, '..', '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    if (
      typeof packageJson !== 'object' ||
      packageJson === null ||
      !('version' in packageJson) ||
      typeof packageJson.version !== 'string'
    ) {
      throw new Error('Version not found in package.json');
    }

    return packageJson.version;
  } catch (error) {
    console.warn(
      'Could not read version from package.json, using fallback:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    return FALLBACK_VERSION;
  }
}

// Read once at module load
export const PACKAGE_VERSION = getPackageVersion();
