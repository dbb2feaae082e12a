/**
 * Installer
 *
 * Resolution and installation engine. Decides where a requirement goes
 * (shared tree or the nested scope of the package being installed),
 * acquires it from a registry, git or the filesystem, materializes its
 * files, writes the ledger and runs the lifecycle hooks around it.
 *
 * Every top-level call gets its own InstallStack unless the caller passes
 * one; nested installs share the stack of their caller.
 */

import { promises as fs } from 'fs';
import { delimiter, dirname, join, resolve } from 'path';

import type {
  AcquireResult,
  InstallDirectories,
  InstallFromDirectoryOptions,
  InstallLocation,
  InstallResult,
  InstallerOptions,
  InterpreterInfo,
  OperationResult,
  PackageIdentity,
  Requirement
} from '../../types/index.js';
import { ModpmError } from '../../types/index.js';
import { DIR_PATTERNS, FILE_PATTERNS, LIFECYCLE_HOOKS, type LifecycleHook } from '../../constants/index.js';
import {
  BridgeInstallFailedError,
  HookFailedError,
  IdentityMismatchError,
  InvalidManifestError,
  NoManifestError,
  PackageNotFoundError,
  RegistryPackageNotFoundError
} from '../../utils/errors.js';
import { copyFile, ensureDir, exists, isDirectory, isFile, removeTree, renameDirectory } from '../../utils/fs.js';
import { createGitCloner, type GitCloner } from '../../utils/git-clone.js';
import { expandTilde } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { prependPathList, withScopedEnv } from '../../utils/scoped-env.js';
import { getInstallDirectories } from '../environment.js';
import { createLifecycleFactory, type LifecycleFactory } from '../lifecycle/package-lifecycle.js';
import { getManifestPath, loadManifest, type PackageManifest } from '../manifest/manifest.js';
import { describeRequirementSource, isArchivePath, splitGitRef } from '../manifest/requirement.js';
import { parseSelector } from '../manifest/selector.js';
import { consoleOutput } from '../ports/console-output.js';
import type { OutputPort } from '../ports/output.js';
import type { RegistryClient, RegistryPackageInfo } from '../registry/registry-client.js';
import { expandScriptNames, ScriptMaker } from '../scripts/script-maker.js';
import { uninstallDirectory } from '../uninstall/uninstaller.js';
import { extractArchive, findPackageRoot, saveStream, withTempDir } from './archive.js';
import { InstallStack } from './install-stack.js';
import { readLinkMarker, writeLedger, writeLinkMarker } from './ledger.js';
import { walkPackageFiles } from './package-files.js';
import { buildPipArguments, createPipRunner, findDistInfo, relinkPipScripts, type PipRunner } from './python-bridge.js';

export type FindPackageResult =
  | { status: 'found'; manifest: PackageManifest; directory: string }
  | { status: 'not-found'; directory: string }
  | { status: 'invalid'; directory: string; error: InvalidManifestError };

export interface FindPackageOptions {
  internal?: boolean;
  stack?: InstallStack;
}

export interface AcquireOptions {
  internal?: boolean;
  pure?: boolean;
  dev?: boolean;
}

export interface GitAcquireOptions extends AcquireOptions {
  /** Overrides a ref given in the URL */
  ref?: string;
  recursive?: boolean;
}

export interface InstallerCollaborators {
  interpreter: InterpreterInfo;
  /** Project directory; `local` installs go to `<cwd>/modpm_modules` */
  cwd: string;
  /** Registries in preference order */
  registries?: RegistryClient[];
  output?: OutputPort;
  modpmHome?: string;
  runtimeCommand?: string;
  scriptMaker?: ScriptMaker;
  lifecycle?: LifecycleFactory;
  gitClone?: GitCloner;
  pipRunner?: PipRunner;
}

export class Installer {
  readonly location: InstallLocation;
  readonly dirs: InstallDirectories;
  /** Distribution info of pip dependencies installed by this instance; null when no metadata was found */
  readonly installedPythonLibs = new Map<string, PackageIdentity | null>();

  private readonly options: InstallerOptions;
  private readonly interpreter: InterpreterInfo;
  private readonly cwd: string;
  private readonly registries: RegistryClient[];
  private readonly output: OutputPort;
  private readonly scriptMaker: ScriptMaker;
  private readonly lifecycle: LifecycleFactory;
  private readonly gitClone: GitCloner;
  private readonly pipRunner: PipRunner;

  constructor(collaborators: InstallerCollaborators, options: InstallerOptions = {}) {
    this.options = options;
    this.location = options.location ?? 'local';
    this.interpreter = collaborators.interpreter;
    this.cwd = resolve(collaborators.cwd);
    this.dirs = getInstallDirectories(this.location, this.interpreter, {
      cwd: this.cwd,
      modpmHome: collaborators.modpmHome
    });
    this.registries = collaborators.registries ?? [];
    this.output = collaborators.output ?? consoleOutput;

    const bridged = this.location !== 'root';
    this.scriptMaker = collaborators.scriptMaker ?? new ScriptMaker({
      directory: this.dirs.bin,
      runtimeCommand: collaborators.runtimeCommand ?? 'modpy',
      pythonPath: bridged ? [this.dirs.pipLib] : [],
      path: bridged ? [this.dirs.pipBin] : []
    });
    this.lifecycle = collaborators.lifecycle ?? createLifecycleFactory({ binDirectories: [this.dirs.bin] });
    this.gitClone = collaborators.gitClone ?? createGitCloner();
    this.pipRunner = collaborators.pipRunner ?? createPipRunner(this.interpreter.executable);
  }

  get upgrade(): boolean {
    return this.options.upgrade ?? false;
  }

  /**
   * Install directory of a package: nested in the innermost package being
   * installed for internal requirements, else the shared packages root.
   */
  packageDirFor(name: string, internal: boolean, stack: InstallStack): string {
    const parent = stack.top();
    if (internal && parent) {
      return join(parent.directory, DIR_PATTERNS.MODULES, name);
    }
    return join(this.dirs.packages, name);
  }

  async findPackage(name: string, options: FindPackageOptions = {}): Promise<FindPackageResult> {
    const stack = options.stack ?? new InstallStack();
    const directory = this.packageDirFor(name, options.internal ?? false, stack);
    if (!(await isDirectory(directory))) {
      return { status: 'not-found', directory };
    }

    const linkTarget = await readLinkMarker(directory);
    const manifestPath = getManifestPath(linkTarget ?? directory);
    try {
      const manifest = await loadManifest(manifestPath, { directory });
      return { status: 'found', manifest, directory };
    } catch (error) {
      if (error instanceof NoManifestError) {
        this.output.warn(`Warning: found package directory without ${FILE_PATTERNS.MANIFEST}`);
        this.output.warn(`  at '${directory}'`);
        return { status: 'not-found', directory };
      }
      if (error instanceof InvalidManifestError) {
        this.output.warn('Warning: invalid package manifest');
        this.output.warn(`  at '${manifestPath}'`);
        return { status: 'invalid', directory, error };
      }
      throw error;
    }
  }

  /**
   * Install the native dependencies of a package (and its dev dependencies
   * with `dev`), then its pip dependencies.
   */
  async installDependenciesFor(
    manifest: PackageManifest,
    options: { dev?: boolean; stack?: InstallStack } = {}
  ): Promise<OperationResult> {
    const dev = options.dev ?? false;
    const stack = options.stack ?? new InstallStack();
    const devLabel = dev ? ' (dev)' : '';

    const deps = manifest.evalFields({ dev }, 'dependencies');
    if (deps.size > 0) {
      this.output.info(`Installing dependencies for "${manifest.identifier}"${devLabel}...`);
      const result = await this.installDependencies(deps, dirname(manifest.filename), stack);
      if (!result.success) {
        return result;
      }
    }

    const pipDeps = manifest.evalFields({ dev }, 'pip-dependencies');
    if (Object.keys(pipDeps).length > 0) {
      this.output.info(`Installing Python dependencies for "${manifest.identifier}"${devLabel}...`);
      const result = await this.installPythonDependencies(pipDeps);
      if (!result.success) {
        return result;
      }
    }

    return { success: true };
  }

  /**
   * Install every requirement of a dependency set that is not present yet,
   * in declaration order. The first failure aborts the rest; packages
   * installed before it stay in place.
   */
  async installDependencies(
    deps: ReadonlyMap<string, Requirement>,
    currentDir: string,
    stack: InstallStack = new InstallStack()
  ): Promise<OperationResult> {
    const queue: Array<[string, Requirement]> = [];

    for (const [name, req] of deps) {
      const found = await this.findPackage(name, { internal: req.internal, stack });
      if (found.status === 'invalid') {
        return { success: false, error: found.error };
      }
      if (found.status === 'not-found') {
        queue.push([name, req]);
        continue;
      }

      const installed = found.manifest;
      if (req.type === 'registry') {
        if (parseSelector(req.selector).test(installed.version)) {
          this.output.info(`  Skipping satisfied dependency "${name}@${req.selector}", have "${installed.identifier}" installed`);
        } else {
          this.output.warn(`  Warning: Dependency "${name}@${req.selector}" unsatisfied, have "${installed.identifier}" installed`);
        }
      } else {
        this.output.info(
          `  Skipping dependency "${name}" from "${describeRequirementSource(req)}", have "${installed.identifier}" installed`
        );
      }

      if (this.options.recursive) {
        const result = await stack.withEntry(installed, found.directory, () =>
          this.installDependenciesFor(installed, { stack })
        );
        if (!result.success) {
          return result;
        }
      }
    }

    if (queue.length === 0) {
      return { success: true };
    }

    this.output.info(`  Installing dependencies: ${queue.map(([name, req]) => (req.type === 'registry' ? describeRequirementSource(req) : `${name}@${describeRequirementSource(req)}`)).join(', ')}`);
    for (const [name, req] of queue) {
      const result = await this.installFromRequirement(req, { currentDir, stack });
      if (!result.success) {
        return result;
      }
      if (result.identity && result.identity.name !== name) {
        this.output.warn(`  Warning: dependency "${name}" installed a package named "${result.identity.name}"`);
      }
    }
    return { success: true };
  }

  /**
   * Dispatch a requirement to the acquisition strategy of its source kind.
   * Relative paths resolve against `currentDir`.
   */
  async installFromRequirement(
    req: Requirement,
    options: { currentDir?: string; stack?: InstallStack; dev?: boolean } = {}
  ): Promise<AcquireResult> {
    const stack = options.stack ?? new InstallStack();
    const acquire: AcquireOptions = { internal: req.internal, pure: req.pure, dev: options.dev };

    switch (req.type) {
      case 'registry':
        return this.installFromRegistry(req.name, req.selector, acquire, stack);
      case 'git':
        return this.installFromGit(req.url, { ...acquire, ref: req.ref, recursive: req.recursive }, stack);
      case 'path': {
        const path = resolve(options.currentDir ?? this.cwd, expandTilde(req.path));
        const result = isArchivePath(path) && (await isFile(path))
          ? await this.installFromArchive(path, acquire, stack)
          : await this.installFromDirectory(path, { ...acquire, develop: req.link }, stack);
        return {
          success: result.success,
          identity: result.manifest ? { name: result.manifest.name, version: result.manifest.version } : undefined,
          error: result.error
        };
      }
    }
  }

  /**
   * Install a package from a directory: load and verify the manifest, make
   * room for it, run `pre-install`, install its dependencies, materialize
   * its files (move, link or filtered copy), write entry scripts and the
   * ledger, then run `post-install`.
   */
  async installFromDirectory(
    directory: string,
    options: InstallFromDirectoryOptions = {},
    stack: InstallStack = new InstallStack()
  ): Promise<InstallResult> {
    const sourceDir = resolve(directory);

    let manifest: PackageManifest;
    try {
      manifest = await loadManifest(getManifestPath(sourceDir));
    } catch (error) {
      if (error instanceof NoManifestError || error instanceof InvalidManifestError) {
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }
      throw error;
    }

    const { expect } = options;
    if (expect && (manifest.name !== expect.name || manifest.version !== expect.version)) {
      const error = new IdentityMismatchError(`${expect.name}@${expect.version}`, manifest.identifier, sourceDir);
      this.output.error(`Error: ${error.message}`);
      return { success: false, manifest, error };
    }

    const internal = options.internal ?? false;
    const parent = stack.top();
    const targetDir = this.packageDirFor(manifest.name, internal, stack);
    this.output.info(
      internal && parent
        ? `Installing "${manifest.identifier}" as internal dependency of "${parent.manifest.identifier}"...`
        : `Installing "${manifest.identifier}"...`
    );

    try {
      if (await exists(targetDir)) {
        if (!this.upgrade) {
          const present = await this.readInstalledManifest(targetDir);
          if (!present) {
            const error = new NoManifestError(targetDir);
            this.output.error(`Error: ${error.message}, specify --upgrade --force to replace it`);
            return { success: false, manifest, error };
          }
          this.output.info(`  Note: install directory "${targetDir}" already exists, specify --upgrade`);
          return { success: true, manifest: present };
        }
        const removed = await this.uninstallDirectory(targetDir);
        if (!removed.success) {
          return { success: false, manifest, error: removed.error };
        }
      }

      return await stack.withEntry(manifest, targetDir, () =>
        this.materialize(manifest, sourceDir, targetDir, options, stack)
      );
    } catch (error) {
      if (error instanceof ModpmError) {
        this.output.error(`Error: ${error.message}`);
        return { success: false, manifest, error };
      }
      throw error;
    }
  }

  private async materialize(
    manifest: PackageManifest,
    sourceDir: string,
    targetDir: string,
    options: InstallFromDirectoryOptions,
    stack: InstallStack
  ): Promise<InstallResult> {
    try {
      await this.lifecycle(manifest).run(LIFECYCLE_HOOKS.PRE_INSTALL, [], { scriptOnly: true });
    } catch (error) {
      return this.hookFailure(LIFECYCLE_HOOKS.PRE_INSTALL, manifest, error, false);
    }

    const deps = await this.installDependenciesFor(manifest, { dev: options.dev, stack });
    if (!deps.success) {
      // Internal dependencies installed so far live under the target
      await removeTree(targetDir);
      return { success: false, manifest, error: deps.error };
    }

    let installed: PackageManifest;
    try {
      installed = await this.writePackageFiles(manifest, sourceDir, targetDir, options);
    } catch (error) {
      await removeTree(targetDir);
      throw error;
    }

    try {
      await this.lifecycle(installed).run(LIFECYCLE_HOOKS.POST_INSTALL, [], { scriptOnly: true });
    } catch (error) {
      return this.hookFailure(LIFECYCLE_HOOKS.POST_INSTALL, installed, error, true);
    }

    return { success: true, manifest: installed };
  }

  /**
   * Move, link or copy the package into `targetDir`, write its entry
   * scripts, and finish with the ledger. Returns the manifest as installed.
   */
  private async writePackageFiles(
    manifest: PackageManifest,
    sourceDir: string,
    targetDir: string,
    options: InstallFromDirectoryOptions
  ): Promise<PackageManifest> {
    const installedFiles: string[] = [];
    let installed = manifest;

    if (options.move) {
      this.output.info(`Moving "${manifest.identifier}" to "${targetDir}" ...`);
      await this.moveIntoPlace(sourceDir, targetDir);
      installedFiles.push(targetDir);
      installed = await loadManifest(getManifestPath(targetDir));
    } else {
      this.output.info(`Installing "${manifest.identifier}" to "${targetDir}" ...`);
      await ensureDir(targetDir);
      if (options.develop) {
        this.output.info(`  Creating ${FILE_PATTERNS.PACKAGE_LINK} to "${sourceDir}"...`);
        installedFiles.push(await writeLinkMarker(targetDir, sourceDir));
      } else {
        for (const file of await walkPackageFiles(manifest)) {
          const destination = join(targetDir, ...file.relativePath.split('/'));
          logger.debug(`Copying ${file.relativePath}`);
          await copyFile(file.absolutePath, destination);
          installedFiles.push(destination);
        }
      }
    }

    if (!options.pure) {
      // Develop installs point their scripts at the live source
      const scriptRoot = options.develop && !options.move ? sourceDir : targetDir;
      installedFiles.push(...(await this.installScripts(installed, scriptRoot)));
    }

    await writeLedger(targetDir, installedFiles);
    return installed;
  }

  private async installScripts(manifest: PackageManifest, root: string): Promise<string[]> {
    const written: string[] = [];
    for (const [name, file] of Object.entries(manifest.bin)) {
      const target = resolve(root, manifest.resolveRoot ?? '.', file);
      for (const scriptName of expandScriptNames(name, this.interpreter.version)) {
        this.output.info(`  Installing script "${scriptName}" to "${this.scriptMaker.directory}"...`);
        written.push(...(await this.scriptMaker.makeEntryScript(scriptName, target, this.dirs.referenceDir)));
      }
    }
    return written;
  }

  /**
   * Rename a disposable source directory into place. Internal dependencies
   * installed before the move already live in the target's nested scope and
   * are carried over.
   */
  private async moveIntoPlace(sourceDir: string, targetDir: string): Promise<void> {
    if (await exists(targetDir)) {
      const nested = join(targetDir, DIR_PATTERNS.MODULES);
      if (await isDirectory(nested)) {
        const sourceNested = join(sourceDir, DIR_PATTERNS.MODULES);
        await removeTree(sourceNested);
        await renameDirectory(nested, sourceNested);
      }
      await removeTree(targetDir);
    }
    await renameDirectory(sourceDir, targetDir);
  }

  private hookFailure(
    hook: LifecycleHook,
    manifest: PackageManifest,
    error: unknown,
    filesPersisted: boolean
  ): InstallResult {
    const hookError = error instanceof HookFailedError ? error : new HookFailedError(hook, manifest.identifier, error);
    if (filesPersisted) {
      hookError.details = { ...hookError.details, filesPersisted: true };
    }
    const stack = hookError.details?.stack;
    if (typeof stack === 'string') {
      this.output.message(stack);
    }
    this.output.error(`Error: ${hook} script failed.`);
    return { success: false, manifest, error: hookError };
  }

  private async readInstalledManifest(installDir: string): Promise<PackageManifest | null> {
    const linkTarget = await readLinkMarker(installDir);
    try {
      return await loadManifest(getManifestPath(linkTarget ?? installDir), { directory: installDir });
    } catch (error) {
      if (error instanceof ModpmError) {
        logger.debug(`No readable manifest in ${installDir}`, error);
        return null;
      }
      throw error;
    }
  }

  /**
   * Extract an archive into a temporary directory and install from it. The
   * temporary directory is removed afterwards.
   */
  async installFromArchive(
    archive: string,
    options: InstallFromDirectoryOptions = {},
    stack: InstallStack = new InstallStack()
  ): Promise<InstallResult> {
    const archivePath = resolve(archive);
    this.output.info(`Unpacking "${archivePath}"...`);
    try {
      return await withTempDir('modpm-unpacked-', async dir => {
        await extractArchive(archivePath, dir);
        const root = await findPackageRoot(dir);
        return this.installFromDirectory(root, { ...options, move: false }, stack);
      });
    } catch (error) {
      if (error instanceof ModpmError) {
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Install the highest version of `name` matching `selector` from the
   * first registry that has one. A package that is already present is kept
   * unless upgrading, even when it does not match.
   */
  async installFromRegistry(
    name: string,
    selector: string,
    options: AcquireOptions = {},
    stack: InstallStack = new InstallStack()
  ): Promise<AcquireResult> {
    try {
      const versionSelector = parseSelector(selector);

      const found = await this.findPackage(name, { internal: options.internal, stack });
      if (found.status === 'invalid') {
        return { success: false, error: found.error };
      }
      if (found.status === 'found') {
        const installed = found.manifest;
        if (!versionSelector.test(installed.version)) {
          this.output.warn(`  Warning: Dependency "${name}@${versionSelector}" unsatisfied, have "${installed.identifier}" installed`);
        }
        if (!this.upgrade) {
          this.output.info(`Package "${installed.identifier}" already installed, specify --upgrade`);
          return { success: true, identity: { name: installed.name, version: installed.version } };
        }
      }

      this.output.info(`Finding package matching "${name}@${versionSelector}"...`);
      let match: { registry: RegistryClient; info: RegistryPackageInfo } | undefined;
      for (const registry of this.registries) {
        const info = await registry.findPackage(name, versionSelector);
        const label = `  Checking registry "${registry.name}" (${registry.baseUrl})...`;
        if (info) {
          this.output.info(`${label} FOUND (${info.name}@${info.version})`);
          match = { registry, info };
          break;
        }
        this.output.info(`${label} NOT FOUND`);
      }

      if (!match) {
        const error = new RegistryPackageNotFoundError(name, versionSelector.raw);
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }

      const identity = { name, version: match.info.version };
      const { registry } = match;
      const result = await withTempDir('modpm-download-', async dir => {
        const spinner = this.output.spinner();
        spinner.start(`Downloading "${name}@${identity.version}"...`);
        const download = await registry.download(name, identity.version);
        const archive = await saveStream(download.stream, dir, download.filename);
        spinner.stop(`Downloaded "${name}@${identity.version}"`);
        return this.installFromArchive(archive, { ...options, expect: identity }, stack);
      });

      return { success: result.success, identity, error: result.error };
    } catch (error) {
      if (error instanceof ModpmError) {
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Clone a repository (`url[@ref]`) next to the packages and move the
   * clone into place. The clone directory never outlives the call.
   */
  async installFromGit(
    spec: string,
    options: GitAcquireOptions = {},
    stack: InstallStack = new InstallStack()
  ): Promise<AcquireResult> {
    const split = splitGitRef(spec);
    const ref = options.ref ?? split.ref;

    await ensureDir(this.dirs.packages);
    const cloneDir = await fs.mkdtemp(join(this.dirs.packages, '.tmp-'));
    try {
      const spinner = this.output.spinner();
      spinner.start(`Cloning "${split.url}"${ref ? ` at "${ref}"` : ''}...`);
      await this.gitClone({ url: split.url, ref, recursive: options.recursive, destination: cloneDir });
      spinner.stop(`Cloned "${split.url}"`);

      const result = await this.installFromDirectory(
        cloneDir,
        { move: true, internal: options.internal, pure: options.pure, dev: options.dev },
        stack
      );
      return {
        success: result.success,
        identity: result.manifest ? { name: result.manifest.name, version: result.manifest.version } : undefined,
        error: result.error
      };
    } catch (error) {
      if (error instanceof ModpmError) {
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }
      throw error;
    } finally {
      await removeTree(cloneDir);
    }
  }

  /**
   * Install pip requirements (`name -> specifier`) plus verbatim pip
   * arguments. PYTHONPATH includes the bridged library directory while pip
   * runs and is restored afterwards.
   */
  async installPythonDependencies(
    deps: Readonly<Record<string, string>>,
    extraArgs: readonly string[] = []
  ): Promise<OperationResult> {
    const modules = Object.keys(deps);
    if (modules.length === 0 && extraArgs.length === 0) {
      return { success: true };
    }

    const args = buildPipArguments(deps, extraArgs, {
      location: this.location,
      dirs: this.dirs,
      useTargetOption: this.options.pipUseTargetOption,
      ignoreInstalled: this.options.pipIgnoreInstalled,
      upgrade: this.upgrade,
      verbose: this.options.verbose
    });
    this.output.info(`  Installing Python dependencies via pip: ${args.join(' ')}`);

    const env = this.location === 'root'
      ? {}
      : { PYTHONPATH: prependPathList([resolve(this.dirs.pipLib)], process.env.PYTHONPATH, delimiter) };

    return withScopedEnv(env, async () => {
      const exitCode = await this.pipRunner(args);
      if (exitCode !== 0) {
        const error = new BridgeInstallFailedError(exitCode);
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }
      for (const name of modules) {
        this.installedPythonLibs.set(name, await findDistInfo(this.dirs.pipLib, name));
      }
      return { success: true };
    });
  }

  /**
   * Wrap the programs pip installed so they run with the bridged
   * PYTHONPATH. Only local installs need this.
   */
  async relinkPipScripts(): Promise<string[]> {
    if (this.location !== 'local') {
      return [];
    }
    return relinkPipScripts({ pipBin: this.dirs.pipBin, scriptMaker: this.scriptMaker, output: this.output });
  }

  async uninstall(name: string, options: { internal?: boolean } = {}): Promise<OperationResult> {
    const found = await this.findPackage(name, { internal: options.internal });
    if (found.status === 'not-found') {
      this.output.info(`Package "${name}" not installed`);
      return { success: false, error: new PackageNotFoundError(name) };
    }
    return this.uninstallDirectory(found.directory);
  }

  async uninstallDirectory(directory: string): Promise<OperationResult> {
    try {
      return await uninstallDirectory(directory, {
        output: this.output,
        lifecycle: this.lifecycle,
        force: this.options.force,
        upgrade: this.upgrade
      });
    } catch (error) {
      if (error instanceof ModpmError) {
        this.output.error(`Error: ${error.message}`);
        return { success: false, error };
      }
      throw error;
    }
  }
}
