import { promises as fs, constants as fsConstants, Dirent } from 'fs';
import { join, dirname } from 'path';
import { parse as parseJsonc, ParseError, printParseErrorCode } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';
import { isJunk } from 'junk';

/**
 * File system utilities with proper error handling
 */

export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Rename a directory (or file) from source path to destination path.
 * Ensures the destination parent directory exists and wraps errors consistently.
 */
export async function renameDirectory(srcPath: string, destPath: string): Promise<void> {
  try {
    await ensureDir(dirname(destPath));
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}

function isAccessError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

/**
 * Run a removal step; on an access error, open up the entry's permissions and retry once.
 */
async function withPermissionRepair<T>(path: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (error) {
    if (!isAccessError(error)) {
      throw error;
    }
    logger.debug(`Access denied on ${path}, forcing permissions and retrying`);
    await fs.chmod(path, 0o777);
    return await op();
  }
}

/**
 * Remove a directory tree. Entries that fail with an access error get their
 * permissions forced open and are retried once before giving up.
 */
export async function removeTree(dirPath: string): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await withPermissionRepair(dirPath, () => fs.readdir(dirPath, { withFileTypes: true }));
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT') {
      return;
    }
    if (code === 'ENOTDIR') {
      await withPermissionRepair(dirPath, () => fs.unlink(dirPath));
      return;
    }
    throw new FileSystemError(`Failed to remove directory: ${dirPath}`, { dirPath, error });
  }

  try {
    for (const entry of entries) {
      const entryPath = join(dirPath, entry.name);
      if (entry.isDirectory()) {
        await removeTree(entryPath);
      } else {
        await withPermissionRepair(entryPath, () => fs.unlink(entryPath));
      }
    }
    await withPermissionRepair(dirPath, () => fs.rmdir(dirPath));
    logger.debug(`Removed tree: ${dirPath}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to remove directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Read a JSONC file (JSON with Comments) and parse it
 * JSONC parser also handles standard JSON files
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(`Failed to parse JSONC file: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`, { path });
  }
  return result;
}
