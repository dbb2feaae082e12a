/**
 * File Walker Utility
 *
 * File system traversal for package directories. Used when copying a package
 * into its install directory.
 */

import { promises as fs } from 'fs';
import { join, relative, sep } from 'path';
import { isJunk } from 'junk';

import { logger } from './logger.js';

/**
 * Filter predicate for file walking. Receives the path relative to the walk
 * root, always with forward slashes.
 */
export type FileFilter = (relativePath: string, isDirectory: boolean) => boolean | Promise<boolean>;

/**
 * Options for file walking
 */
export interface WalkOptions {
  /**
   * Filter predicate to include/exclude files and directories
   */
  filter?: FileFilter;

  /**
   * Follow symbolic links (default: false). With `'files'`, links to files
   * are followed and links to directories skipped.
   */
  followSymlinks?: SymlinkMode;
}

export type SymlinkMode = boolean | 'files';

export interface WalkedFile {
  absolutePath: string;
  /** Forward-slash path relative to the walk root */
  relativePath: string;
}

export function toPosixRelative(root: string, fullPath: string): string {
  return relative(root, fullPath).split(sep).join('/');
}

/**
 * Async generator that walks a directory tree and yields files.
 * OS junk files (.DS_Store, Thumbs.db, ...) are never yielded.
 *
 * @example
 * for await (const file of walkFiles('/path/to/pkg')) {
 *   console.log(file.relativePath);
 * }
 */
export async function* walkFiles(
  root: string,
  options: WalkOptions = {}
): AsyncGenerator<WalkedFile> {
  yield* walkFilesInternal(root, root, options.filter, options.followSymlinks ?? false);
}

async function* walkFilesInternal(
  root: string,
  dir: string,
  filter: FileFilter | undefined,
  followSymlinks: SymlinkMode
): AsyncGenerator<WalkedFile> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dir, entry.name);
    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();

    if (entry.isSymbolicLink()) {
      if (!followSymlinks) {
        continue;
      }
      try {
        const stat = await fs.stat(fullPath);
        isDirectory = stat.isDirectory();
        isFile = stat.isFile();
      } catch (error) {
        logger.debug(`Skipping broken symlink ${fullPath}`, error);
        continue;
      }
      if (isDirectory && followSymlinks === 'files') {
        continue;
      }
    }

    const relativePath = toPosixRelative(root, fullPath);
    if (filter && !(await filter(relativePath, isDirectory))) {
      continue;
    }

    if (isDirectory) {
      yield* walkFilesInternal(root, fullPath, filter, followSymlinks);
    } else if (isFile) {
      yield { absolutePath: fullPath, relativePath };
    }
  }
}

/**
 * Walk directory and collect all files into an array
 */
export async function collectFiles(
  root: string,
  options: WalkOptions = {}
): Promise<WalkedFile[]> {
  const files: WalkedFile[] = [];

  for await (const file of walkFiles(root, options)) {
    files.push(file);
  }

  return files;
}
