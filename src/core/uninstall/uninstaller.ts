/**
 * Uninstall of a package directory, driven by its installed-files ledger.
 */

import { promises as fs } from 'fs';

import { FILE_PATTERNS, LIFECYCLE_HOOKS } from '../../constants/index.js';
import type { OperationResult } from '../../types/index.js';
import { HookFailedError, InvalidManifestError, NoManifestError, UninstallFailedError } from '../../utils/errors.js';
import { isDirectory, removeTree } from '../../utils/fs.js';
import { readLedger, readLinkMarker } from '../install/ledger.js';
import type { LifecycleFactory } from '../lifecycle/package-lifecycle.js';
import { getManifestPath, loadManifest, type PackageManifest } from '../manifest/manifest.js';
import type { OutputPort } from '../ports/output.js';

export interface UninstallDirectoryOptions {
  output: OutputPort;
  lifecycle: LifecycleFactory;
  /** Remove a directory without a manifest instead of refusing */
  force?: boolean;
  /** Only changes the progress message */
  upgrade?: boolean;
}

async function removeListedPath(path: string): Promise<void> {
  if (await isDirectory(path)) {
    await removeTree(path);
  } else {
    await fs.unlink(path);
  }
}

/**
 * Uninstall the package installed in `directory`.
 *
 * A develop-mode install is resolved through its link marker; only the
 * install directory is removed, never the linked source.
 */
export async function uninstallDirectory(directory: string, options: UninstallDirectoryOptions): Promise<OperationResult> {
  const { output } = options;
  const linkTarget = await readLinkMarker(directory);

  let manifest: PackageManifest;
  try {
    manifest = await loadManifest(getManifestPath(linkTarget ?? directory), { directory });
  } catch (error) {
    if (error instanceof NoManifestError) {
      if (!options.force) {
        output.error(
          `Can not uninstall: directory "${directory}": No package manifest, please remove the directory manually or pass -f,--force`
        );
        return { success: false, error: new UninstallFailedError(directory, 'no package manifest') };
      }
      output.info(`Removing previous directory: "${directory}"`);
      await removeTree(directory);
      return { success: true };
    }
    if (error instanceof InvalidManifestError) {
      output.error(`Can not uninstall: directory "${directory}": ${error.message}`);
      return { success: false, error };
    }
    throw error;
  }

  output.info(`Uninstalling "${manifest.identifier}" from "${directory}"${options.upgrade ? ' before upgrade' : ''}...`);

  try {
    await options.lifecycle(manifest).run(LIFECYCLE_HOOKS.PRE_UNINSTALL, [], { scriptOnly: true });
  } catch (error) {
    const hookError = error instanceof HookFailedError
      ? error
      : new HookFailedError(LIFECYCLE_HOOKS.PRE_UNINSTALL, manifest.identifier, error);
    const stack = hookError.details?.stack;
    if (typeof stack === 'string') {
      output.message(stack);
    }
    output.error('Error: pre-uninstall script failed.');
    return { success: false, error: hookError };
  }

  const installedFiles = await readLedger(directory);
  if (installedFiles === null) {
    output.warn(`  Warning: No \`${FILE_PATTERNS.INSTALLED_FILES}\` found in package directory`);
  }

  for (const path of installedFiles ?? []) {
    try {
      await removeListedPath(path);
      output.info(`  Removed "${path}"...`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      output.warn(`  "${path}": ${reason}`);
    }
  }

  await removeTree(directory);
  return { success: true };
}
