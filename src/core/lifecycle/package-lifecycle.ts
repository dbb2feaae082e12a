/**
 * Package Lifecycle
 *
 * Runs the shell commands a manifest declares under `scripts`, both the
 * install hooks (`pre-install`, `post-install`, `pre-uninstall`) and
 * user scripts started through `modpm run`.
 */

import { delimiter, dirname } from 'path';

import { HookFailedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { quoteArgument, runProcess } from '../../utils/process.js';
import { prependPathList } from '../../utils/scoped-env.js';
import type { PackageManifest } from '../manifest/manifest.js';

export interface LifecycleRunOptions {
  /**
   * The hook is optional for this call: a missing script is not worth a
   * diagnostic. Install hooks always pass this.
   */
  scriptOnly?: boolean;
}

export interface Lifecycle {
  /**
   * Run `scripts[hook]` with `args` appended. Resolves false when the
   * manifest declares no such script; rejects with HookFailedError when it
   * exits non-zero or cannot be started.
   */
  run(hook: string, args: string[], options?: LifecycleRunOptions): Promise<boolean>;
}

export type LifecycleFactory = (manifest: PackageManifest) => Lifecycle;

export interface PackageLifecycleOptions {
  /** Directories put in front of PATH while a script runs */
  binDirectories?: string[];
}

export class PackageLifecycle implements Lifecycle {
  constructor(
    private readonly manifest: PackageManifest,
    private readonly options: PackageLifecycleOptions = {}
  ) {}

  async run(hook: string, args: string[], options: LifecycleRunOptions = {}): Promise<boolean> {
    const script = this.manifest.scripts[hook];
    if (script === undefined) {
      if (!options.scriptOnly) {
        logger.debug(`No script '${hook}' in ${this.manifest.identifier}`);
      }
      return false;
    }

    const command = [script, ...args.map(arg => quoteArgument(arg))].join(' ');
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      MODPM_HOOK: hook,
      MODPM_PACKAGE_NAME: this.manifest.name,
      MODPM_PACKAGE_VERSION: this.manifest.version
    };
    const binDirectories = this.options.binDirectories ?? [];
    if (binDirectories.length > 0) {
      env.PATH = prependPathList(binDirectories, process.env.PATH, delimiter);
    }

    // The manifest file sits in the real source directory, also for linked installs
    const cwd = dirname(this.manifest.filename);
    let exitCode: number | null;
    try {
      ({ exitCode } = await runProcess(command, [], { cwd, env, inherit: true, shell: true }));
    } catch (error) {
      throw new HookFailedError(hook, this.manifest.identifier, error);
    }
    if (exitCode !== 0) {
      throw new HookFailedError(hook, this.manifest.identifier, new Error(`exit code ${exitCode ?? 'unknown'}`), {
        exitCode
      });
    }
    return true;
  }
}

export function createLifecycleFactory(options: PackageLifecycleOptions = {}): LifecycleFactory {
  return manifest => new PackageLifecycle(manifest, options);
}
