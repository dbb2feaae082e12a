/**
 * Package file selection
 *
 * Decides which files of a package directory are copied into its install
 * directory. Excludes (the manifest's `dist.exclude`, the built-in defaults
 * and, without an include list, the `.modpmignore` file) always win; when an
 * include list exists, a file must also match one of its patterns. The
 * manifest file is always copied.
 */

import { join } from 'path';
import { minimatch } from 'minimatch';

import { DEFAULT_EXCLUDE_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { collectFiles, type WalkedFile } from '../../utils/file-walker.js';
import { logger } from '../../utils/logger.js';
import type { PackageManifest } from '../manifest/manifest.js';

const MATCH_OPTIONS = { dot: true, matchBase: true } as const;

export interface PackageFileRules {
  include: string[];
  exclude: string[];
}

function normalizePattern(pattern: string): string {
  let normalized = pattern.trim().replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  if (normalized.startsWith('/')) {
    normalized = normalized.slice(1);
  }
  return normalized;
}

/**
 * `dir/`, `dir/*` and `dir/**` all name everything below `dir`.
 */
function directoryPrefixOf(pattern: string): string | null {
  for (const suffix of ['/**', '/*', '/']) {
    if (pattern.endsWith(suffix) && pattern.length > suffix.length) {
      return pattern.slice(0, -suffix.length);
    }
  }
  return null;
}

/**
 * Match a forward-slash relative path against one pattern: exact match,
 * directory-prefix match or glob.
 */
export function matchesPattern(relativePath: string, pattern: string): boolean {
  const normalized = normalizePattern(pattern);
  if (!normalized) {
    return false;
  }
  if (relativePath === normalized) {
    return true;
  }

  const prefix = directoryPrefixOf(normalized) ?? normalized;
  if (
    relativePath.startsWith(`${prefix}/`) ||
    minimatch(relativePath, prefix, MATCH_OPTIONS) ||
    minimatch(relativePath, `${prefix}/**`, MATCH_OPTIONS)
  ) {
    return true;
  }

  return minimatch(relativePath, normalized, MATCH_OPTIONS);
}

export function matchesAnyPattern(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesPattern(relativePath, pattern));
}

/**
 * Parse gitignore-style lines. Negations are not supported and are skipped.
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    if (line.startsWith('!')) {
      logger.debug(`Ignoring unsupported negated pattern '${line}'`);
      continue;
    }
    patterns.push(line);
  }
  return patterns;
}

export async function loadIgnorePatterns(directory: string): Promise<string[]> {
  const ignorePath = join(directory, FILE_PATTERNS.IGNORE_FILE);
  if (!(await exists(ignorePath))) {
    return [];
  }
  return parseIgnoreFile(await readTextFile(ignorePath));
}

export async function resolvePackageFileRules(manifest: PackageManifest): Promise<PackageFileRules> {
  const include = [...manifest.dist.include];
  const exclude = [...manifest.dist.exclude, ...DEFAULT_EXCLUDE_PATTERNS];
  if (include.length === 0) {
    exclude.push(...(await loadIgnorePatterns(manifest.directory)));
  }
  return { include, exclude };
}

export function isPackageFileIncluded(relativePath: string, rules: PackageFileRules): boolean {
  if (relativePath === FILE_PATTERNS.MANIFEST) {
    return true;
  }
  if (matchesAnyPattern(relativePath, rules.exclude)) {
    return false;
  }
  if (rules.include.length === 0) {
    return true;
  }
  return matchesAnyPattern(relativePath, rules.include);
}

/**
 * List the files of a package that get copied on install, sorted by path.
 */
export async function walkPackageFiles(manifest: PackageManifest): Promise<WalkedFile[]> {
  const rules = await resolvePackageFileRules(manifest);
  return collectFiles(manifest.directory, {
    followSymlinks: 'files',
    filter: (relativePath, isDirectory) =>
      isDirectory
        ? !matchesAnyPattern(relativePath, rules.exclude)
        : isPackageFileIncluded(relativePath, rules)
  });
}
