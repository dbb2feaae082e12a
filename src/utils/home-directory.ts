/**
 * Home Directory Utilities
 *
 * Resolution of the user's home directory, the modpm home (`~/.modpm`) and
 * tilde paths.
 */

import { homedir } from 'os';
import { join, resolve } from 'path';

import { DIR_PATTERNS } from '../constants/index.js';

/**
 * Get the home directory path.
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * The per-user modpm directory. `MODPM_HOME` replaces the default `~/.modpm`.
 */
export function getModpmHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.MODPM_HOME;
  if (override) {
    return resolve(override);
  }
  return join(getHomeDirectory(), DIR_PATTERNS.MODPM_HOME);
}

/**
 * Expand tilde notation to full home directory path.
 *
 * @param path - Path that may start with ~/
 * @returns Path with ~/ expanded to home directory
 */
export function expandTilde(path: string): string {
  if (path === '~' || path === '~/') {
    return getHomeDirectory();
  }

  if (path.startsWith('~/')) {
    return resolve(getHomeDirectory(), path.slice(2));
  }

  return path;
}
