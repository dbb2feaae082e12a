import { Command } from 'commander';
import { basename, resolve } from 'path';
import * as semver from 'semver';

import type { ManifestData } from '../types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import type { GlobalOptions } from '../cli/options.js';
import { getManifestPath, serializeManifest, writeManifest } from '../core/manifest/manifest.js';
import { isValidPackageName } from '../core/manifest/requirement.js';
import { resolveOutput, resolvePrompt } from '../core/ports/resolve.js';
import type { PromptPort } from '../core/ports/prompt.js';
import { UserCancellationError, ValidationError, withErrorHandling } from '../utils/errors.js';
import { ensureDir, exists } from '../utils/fs.js';

/**
 * Ask for the fields of a new manifest. Empty optional answers are left out.
 */
export async function promptManifestData(prompt: PromptPort, defaultName: string): Promise<ManifestData> {
  const name = await prompt.text('Package name', {
    initial: defaultName,
    validate: value => (isValidPackageName(value) ? undefined : `'${value}' is not a valid package name`)
  });
  const version = await prompt.text('Version', {
    initial: '1.0.0',
    validate: value => (semver.valid(value) ? undefined : `'${value}' is not a valid version`)
  });
  const description = await prompt.text('Description', { initial: '' });
  const author = await prompt.text('Author', { initial: '' });
  const license = await prompt.text('License', { initial: 'MIT' });

  const data: ManifestData = { name, version };
  if (description) data.description = description;
  if (author) data.author = author;
  if (license) data.license = license;
  return data;
}

export function setupInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a modpm.yml in a directory')
    .argument('[directory]', 'package directory', '.')
    .action(
      withErrorHandling(async (directory: string, _options: unknown, cmd: Command) => {
        const globals = cmd.optsWithGlobals<GlobalOptions>();
        const ctx = await createCliExecutionContext({ cwd: globals.cwd });
        const output = resolveOutput(ctx);
        const prompt = resolvePrompt(ctx);

        const packageDir = resolve(ctx.sourceCwd, directory);
        const manifestPath = getManifestPath(packageDir);
        if (await exists(manifestPath)) {
          throw new ValidationError(`${manifestPath} already exists`);
        }

        const data = await promptManifestData(prompt, basename(packageDir));
        output.note(serializeManifest(data), manifestPath);
        if (!(await prompt.confirm('Is this ok?', true))) {
          throw new UserCancellationError();
        }

        await ensureDir(packageDir);
        await writeManifest(manifestPath, data);
        output.success(`Created ${manifestPath}`);
      })
    );
}
