import { Command } from 'commander';
import { resolve } from 'path';

import type { DependencySpec, OperationResult } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { addLocationOptions, toLocationFlags, type GlobalOptions, type LocationOptions } from '../cli/options.js';
import { createInstaller } from '../core/install/installer-factory.js';
import { parsePipRequirement } from '../core/install/python-bridge.js';
import { pipSpecForSave, saveDependencies, specForSave } from '../core/install/save-dependencies.js';
import { getManifestPath } from '../core/manifest/manifest.js';
import { parseRequirement } from '../core/manifest/requirement.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

interface InstallCommandOptions extends LocationOptions {
  upgrade?: boolean;
  develop?: string[];
  pip?: string[];
  recursive?: boolean;
  dev?: boolean;
  production?: boolean;
  save?: boolean;
  saveDev?: boolean;
  internal?: boolean;
  pure?: boolean;
  force?: boolean;
  packagedir?: string;
  pipIgnoreInstalled?: boolean;
  pipUseTargetOption?: boolean;
}

const PIP_SPEC_PREFIX = 'pip+';
const PIP_SPEC_SHORT_PREFIX = '~';

function pipSpecBody(spec: string): string | null {
  if (spec.startsWith(PIP_SPEC_PREFIX)) {
    return spec.slice(PIP_SPEC_PREFIX.length);
  }
  // `~/...` is a home-relative path
  if (spec.startsWith(PIP_SPEC_SHORT_PREFIX) && !spec.startsWith('~/')) {
    return spec.slice(PIP_SPEC_SHORT_PREFIX.length);
  }
  return null;
}

export interface SplitSpecs {
  native: string[];
  pip: string[];
}

/**
 * Separate pip requirements (`~name` or `pip+name`) from native ones.
 */
export function splitInstallSpecs(specs: readonly string[], pipSpecs: readonly string[] = []): SplitSpecs {
  const native: string[] = [];
  const pip = [...pipSpecs];
  for (const spec of specs) {
    const body = pipSpecBody(spec);
    if (body !== null) {
      pip.push(body);
    } else {
      native.push(spec);
    }
  }
  return { native, pip };
}

export function validateInstallFlags(options: InstallCommandOptions): void {
  if (options.save && options.saveDev) {
    throw new ValidationError('--save and --save-dev can not be used together');
  }
  if (options.dev && options.production) {
    throw new ValidationError('--dev and --production can not be used together');
  }
}

function failure(result: OperationResult, fallback: string): Error {
  return result.error ?? new Error(fallback);
}

async function installCommand(specs: string[], options: InstallCommandOptions, globals: GlobalOptions): Promise<void> {
  validateInstallFlags(options);

  const ctx = await createCliExecutionContext({ cwd: globals.cwd, packageDir: options.packagedir });
  const output = resolveOutput(ctx);
  const saving = Boolean(options.save || options.saveDev);

  const location = toLocationFlags(options);
  let internal = options.internal;
  if (internal === undefined && (location.global || location.root)) {
    output.info(`Note: implying --internal due to ${location.global ? '--global' : '--root'}`);
    internal = true;
  }

  const { native, pip } = splitInstallSpecs(specs, options.pip);
  const develop = options.develop ?? [];
  const pureInstall = native.length === 0 && pip.length === 0 && develop.length === 0;

  const pipDeps: Record<string, string> = {};
  const pipExtraArgs: string[] = [];
  for (const line of pip) {
    const parsed = parsePipRequirement(line);
    if (parsed) {
      pipDeps[parsed.name] = parsed.specifier;
    } else if (saving) {
      throw new ValidationError(`can not --save pip requirement '${line}', only names with an optional version are supported`);
    } else {
      pipExtraArgs.push(line);
    }
  }

  if (saving && !(await exists(getManifestPath(ctx.packageDir)))) {
    throw new ValidationError(
      `can not ${options.saveDev ? '--save-dev' : '--save'} without ${FILE_PATTERNS.MANIFEST}`
    );
  }

  const installer = await createInstaller({
    cwd: ctx.packageDir,
    location,
    output,
    upgrade: options.upgrade || pureInstall,
    recursive: options.recursive,
    force: options.force,
    verbose: globals.verbose,
    pipIgnoreInstalled: options.pipIgnoreInstalled,
    pipUseTargetOption: options.pipUseTargetOption
  });

  if (pureInstall) {
    const dev = !options.production;
    logger.debug('Installing dependencies of the current package', { packageDir: ctx.packageDir, dev });
    const result = await installer.installFromDirectory(ctx.packageDir, { develop: true, dev });
    if (!result.success) {
      throw failure(result, 'Installation failed');
    }
    await installer.relinkPipScripts();
    return;
  }

  const dev = options.dev ?? false;
  const savedNative = new Map<string, DependencySpec>();

  for (const path of develop) {
    const result = await installer.installFromDirectory(resolve(ctx.sourceCwd, path), {
      develop: true,
      dev,
      internal,
      pure: options.pure
    });
    if (!result.success) {
      throw failure(result, `Installation of "${path}" failed`);
    }
  }

  for (const spec of native) {
    const req = parseRequirement(spec, { internal, pure: options.pure });
    const result = await installer.installFromRequirement(req, { currentDir: ctx.sourceCwd, dev });
    if (!result.success) {
      throw failure(result, `Installation of "${spec}" failed`);
    }
    const name = result.identity?.name ?? req.name;
    if (saving && name) {
      savedNative.set(name, specForSave(req, result.identity));
    }
  }

  const pipResult = await installer.installPythonDependencies(pipDeps, pipExtraArgs);
  if (!pipResult.success) {
    throw failure(pipResult, 'pip installation failed');
  }
  await installer.relinkPipScripts();

  if (saving) {
    const savedPip: Record<string, string> = {};
    for (const name of Object.keys(pipDeps)) {
      savedPip[name] = pipSpecForSave(name, installer.installedPythonLibs.get(name), output);
    }
    await saveDependencies(ctx.packageDir, { native: savedNative, pip: savedPip }, { dev: Boolean(options.saveDev) });
    output.success(`Saved dependencies to ${getManifestPath(ctx.packageDir)}`);
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function setupInstallCommand(program: Command): void {
  const command = program
    .command('install')
    .alias('i')
    .description('Install packages from a registry, git, a directory or an archive. Without arguments, installs the dependencies of the current package.')
    .argument('[specs...]', 'name[@selector], git+<url>[@ref], a path or an archive; `~name` or `pip+name` for pip requirements')
    .option('-U, --upgrade', 'reinstall packages that are already installed')
    .option('-e, --develop <path>', 'install a package directory in develop mode (repeatable)', collect)
    .option('--pip <specs...>', 'pip requirements to install')
    .option('-R, --recursive', 're-verify dependencies of packages that are already installed')
    .option('--dev', 'also install dev dependencies')
    .option('--production', 'do not install dev dependencies')
    .option('--save', 'add the installed packages to dependencies in modpm.yml')
    .option('--save-dev', 'add the installed packages to dev-dependencies in modpm.yml')
    .option('--internal', 'install nested in the dependent package')
    .option('--no-internal', 'install into the shared package tree')
    .option('--pure', 'do not create entry-point scripts')
    .option('-f, --force', 'remove package directories without a manifest')
    .option('--packagedir <dir>', 'package directory to work on')
    .option('--pip-ignore-installed', 'pass --ignore-installed to pip')
    .option('--pip-use-target-option', 'install pip packages with --target instead of --prefix');

  addLocationOptions(command).action(
    withErrorHandling(async (specs: string[], options: InstallCommandOptions, cmd: Command) => {
      await installCommand(specs, options, cmd.optsWithGlobals<GlobalOptions>());
    })
  );
}
