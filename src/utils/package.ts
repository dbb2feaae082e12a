import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import { logger } from './logger.js';

/**
 * Version of the modpm package itself, from its package.json (two levels
 * above both src/utils and dist/utils).
 */
export function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug(`Could not read ${packageJsonPath}`, error);
  }
  return '0.0.0';
}
