import { Command } from 'commander';

import { createCliExecutionContext } from '../cli/context.js';
import { addLocationOptions, toLocationFlags, type GlobalOptions, type LocationOptions } from '../cli/options.js';
import { createInstaller } from '../core/install/installer-factory.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { withErrorHandling } from '../utils/errors.js';

interface BinCommandOptions extends LocationOptions {
  pip?: boolean;
}

export function setupBinCommand(program: Command): void {
  const command = program
    .command('bin')
    .description('Print the directory entry-point scripts are installed to')
    .option('--pip', 'print the bin directory of pip-installed programs instead');

  addLocationOptions(command).action(
    withErrorHandling(async (options: BinCommandOptions, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd: globals.cwd });
      const installer = await createInstaller({
        cwd: ctx.packageDir,
        location: toLocationFlags(options),
        output: resolveOutput(ctx)
      });
      console.log(options.pip ? installer.dirs.pipBin : installer.dirs.bin);
    })
  );
}
