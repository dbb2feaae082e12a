/**
 * Installed-files ledger and develop-mode link marker.
 *
 * Both are plain text sidecar files inside an install directory: the ledger
 * holds one absolute path per line (newline-terminated), the link marker a
 * single absolute source directory.
 */

import { join, resolve } from 'path';

import { FILE_PATTERNS } from '../../constants/index.js';
import { isFile, readTextFile, writeTextFile } from '../../utils/fs.js';

export function getLedgerPath(installDir: string): string {
  return join(installDir, FILE_PATTERNS.INSTALLED_FILES);
}

export function getLinkMarkerPath(installDir: string): string {
  return join(installDir, FILE_PATTERNS.PACKAGE_LINK);
}

export function formatLedger(paths: readonly string[]): string {
  return paths.map(path => `${path}\n`).join('');
}

export function parseLedger(content: string): string[] {
  return content.split(/\r?\n/).filter(line => line.length > 0);
}

/**
 * Write the ledger for an install directory and return its path.
 */
export async function writeLedger(installDir: string, paths: readonly string[]): Promise<string> {
  const ledgerPath = getLedgerPath(installDir);
  await writeTextFile(ledgerPath, formatLedger(paths));
  return ledgerPath;
}

/**
 * Read the ledger of an install directory, or null when it has none.
 */
export async function readLedger(installDir: string): Promise<string[] | null> {
  const ledgerPath = getLedgerPath(installDir);
  if (!(await isFile(ledgerPath))) {
    return null;
  }
  return parseLedger(await readTextFile(ledgerPath));
}

export async function writeLinkMarker(installDir: string, sourceDir: string): Promise<string> {
  const markerPath = getLinkMarkerPath(installDir);
  await writeTextFile(markerPath, `${resolve(sourceDir)}\n`);
  return markerPath;
}

/**
 * The source directory a develop-mode install points at, or null for a
 * regular install.
 */
export async function readLinkMarker(installDir: string): Promise<string | null> {
  const markerPath = getLinkMarkerPath(installDir);
  if (!(await isFile(markerPath))) {
    return null;
  }
  const target = (await readTextFile(markerPath)).trim();
  return target ? target : null;
}
