import { readFileSync } from 'fs';
import { join } from 'path';
import { cliLogger } from '@core/utils/logger';

// package.json sits one level above both core/ and the bundled dist/
function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    cliLogger.warn('Failed to read version from package.json', { error: String(error) });
  }
  return '0.0.0';
}

export const version = readVersion();
