/**
 * Archive handling for registry downloads and local `.tar`/`.tar.gz` installs.
 */

import { createWriteStream, promises as fs } from 'fs';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import * as tar from 'tar';
import { isJunk } from 'junk';

import { FILE_PATTERNS } from '../../constants/index.js';
import { FileSystemError } from '../../utils/errors.js';
import { exists, removeTree } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whatever the outcome.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await removeTree(dir);
  }
}

/**
 * Stream a download into `<dir>/<filename>` and return the file path.
 */
export async function saveStream(stream: Readable, dir: string, filename: string): Promise<string> {
  const target = join(dir, basename(filename) || 'package.tar.gz');
  try {
    await pipeline(stream, createWriteStream(target));
  } catch (error) {
    throw new FileSystemError(`Failed to write download to ${target}`, { error });
  }
  return target;
}

export async function extractArchive(archive: string, destination: string): Promise<void> {
  try {
    await tar.x({ file: archive, cwd: destination });
  } catch (error) {
    throw new FileSystemError(`Failed to extract archive: ${archive}`, { archive, error });
  }
  logger.debug(`Extracted ${archive} to ${destination}`);
}

/**
 * The package root inside an extracted archive: the single top-level
 * directory when the archive wraps its contents in one (`pkg-1.0.0/`),
 * otherwise the extraction directory itself.
 */
export async function findPackageRoot(extractedDir: string): Promise<string> {
  if (await exists(join(extractedDir, FILE_PATTERNS.MANIFEST))) {
    return extractedDir;
  }
  const entries = (await fs.readdir(extractedDir, { withFileTypes: true })).filter(entry => !isJunk(entry.name));
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(extractedDir, entries[0].name);
  }
  return extractedDir;
}
