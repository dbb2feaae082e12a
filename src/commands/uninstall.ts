import { Command } from 'commander';
import { resolve } from 'path';

import { createCliExecutionContext } from '../cli/context.js';
import { addLocationOptions, toLocationFlags, type GlobalOptions, type LocationOptions } from '../cli/options.js';
import { createInstaller } from '../core/install/installer-factory.js';
import { getManifestPath, loadManifest } from '../core/manifest/manifest.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { withErrorHandling } from '../utils/errors.js';
import { isDirectory } from '../utils/fs.js';

interface UninstallCommandOptions extends LocationOptions {
  force?: boolean;
}

function looksLikeDirectoryArgument(arg: string): boolean {
  return arg === '.' || arg === '..' || arg.includes('/') || arg.includes('\\');
}

/**
 * Package name an uninstall argument refers to: a package directory (or `.`)
 * stands for the package its manifest names.
 */
export async function resolvePackageArgument(arg: string, sourceCwd: string): Promise<string> {
  const candidate = resolve(sourceCwd, arg);
  if (looksLikeDirectoryArgument(arg) && (await isDirectory(candidate))) {
    const manifest = await loadManifest(getManifestPath(candidate));
    return manifest.name;
  }
  return arg;
}

async function uninstallCommand(packages: string[], options: UninstallCommandOptions, globals: GlobalOptions): Promise<void> {
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const output = resolveOutput(ctx);
  const installer = await createInstaller({
    cwd: ctx.packageDir,
    location: toLocationFlags(options),
    output,
    force: options.force
  });

  const failed: string[] = [];
  for (const arg of packages) {
    const name = await resolvePackageArgument(arg, ctx.sourceCwd);
    const result = await installer.uninstall(name);
    if (!result.success) {
      failed.push(name);
    }
  }

  if (failed.length > 0) {
    throw new Error(`uninstall failed for: ${failed.join(', ')}`);
  }
}

export function setupUninstallCommand(program: Command): void {
  const command = program
    .command('uninstall')
    .alias('un')
    .description('Uninstall packages, removing every file their install recorded')
    .argument('<packages...>', 'package names, or package directories (`.` for the current package)')
    .option('-f, --force', 'remove package directories without a manifest');

  addLocationOptions(command).action(
    withErrorHandling(async (packages: string[], options: UninstallCommandOptions, cmd: Command) => {
      await uninstallCommand(packages, options, cmd.optsWithGlobals<GlobalOptions>());
    })
  );
}
