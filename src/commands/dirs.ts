import { Command } from 'commander';

import type { InstallDirectories } from '../types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { addLocationOptions, toLocationFlags, type GlobalOptions, type LocationOptions } from '../cli/options.js';
import { createInstaller } from '../core/install/installer-factory.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { withErrorHandling } from '../utils/errors.js';

interface DirsCommandOptions extends LocationOptions {
  packages?: boolean;
  bin?: boolean;
  pipPrefix?: boolean;
  pipBin?: boolean;
  pipLib?: boolean;
  reference?: boolean;
}

const DIRECTORY_LABELS: ReadonlyArray<[keyof InstallDirectories, keyof DirsCommandOptions, string]> = [
  ['packages', 'packages', 'Packages'],
  ['bin', 'bin', 'Bin'],
  ['pipPrefix', 'pipPrefix', 'Pip Prefix'],
  ['pipLib', 'pipLib', 'Pip Lib'],
  ['pipBin', 'pipBin', 'Pip Bin'],
  ['referenceDir', 'reference', 'Reference']
];

/**
 * Lines printed by `modpm dirs`: the directory of the first selecting flag,
 * or every directory with its label.
 */
export function formatDirectories(dirs: InstallDirectories, options: DirsCommandOptions): string[] {
  const selected = DIRECTORY_LABELS.find(([, flag]) => options[flag] === true);
  if (selected) {
    return [dirs[selected[0]]];
  }
  const width = Math.max(...DIRECTORY_LABELS.map(([, , label]) => label.length)) + 1;
  return DIRECTORY_LABELS.map(([key, , label]) => `${`${label}:`.padEnd(width)} ${dirs[key]}`);
}

export function setupDirsCommand(program: Command): void {
  const command = program
    .command('dirs')
    .description('Print the install directories of a location')
    .option('--packages', 'print only the packages directory')
    .option('--bin', 'print only the bin directory')
    .option('--pip-prefix', 'print only the pip prefix')
    .option('--pip-bin', 'print only the pip bin directory')
    .option('--pip-lib', 'print only the pip library directory')
    .option('--reference', 'print only the reference directory');

  addLocationOptions(command).action(
    withErrorHandling(async (options: DirsCommandOptions, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd: globals.cwd });
      const output = resolveOutput(ctx);
      const installer = await createInstaller({
        cwd: ctx.packageDir,
        location: toLocationFlags(options),
        output
      });
      for (const line of formatDirectories(installer.dirs, options)) {
        console.log(line);
      }
    })
  );
}
