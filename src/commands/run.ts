import { Command } from 'commander';
import { join } from 'path';

import { DIR_PATTERNS } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import type { GlobalOptions } from '../cli/options.js';
import { PackageLifecycle } from '../core/lifecycle/package-lifecycle.js';
import { getManifestPath, loadManifest } from '../core/manifest/manifest.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';

interface RunCommandOptions {
  packagedir?: string;
}

export function setupRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a script from the current package manifest, with the local bin directory on PATH')
    .argument('<script>', 'script name from `scripts` in modpm.yml')
    .argument('[args...]', 'arguments appended to the script')
    .option('--packagedir <dir>', 'package directory to work on')
    .action(
      withErrorHandling(async (script: string, args: string[], options: RunCommandOptions, cmd: Command) => {
        const globals = cmd.optsWithGlobals<GlobalOptions>();
        const ctx = await createCliExecutionContext({ cwd: globals.cwd, packageDir: options.packagedir });
        const manifest = await loadManifest(getManifestPath(ctx.packageDir));

        const lifecycle = new PackageLifecycle(manifest, {
          binDirectories: [join(ctx.packageDir, DIR_PATTERNS.MODULES, DIR_PATTERNS.BIN)]
        });
        if (!(await lifecycle.run(script, args))) {
          throw new ValidationError(`no script '${script}'`);
        }
      })
    );
}
