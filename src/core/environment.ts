/**
 * Interpreter probe and install directory layout.
 *
 * Packages run on the `modpy` runtime, which sits on a Python interpreter;
 * the interpreter decides the system prefix for `--root` installs and the
 * `lib/pythonX.Y/site-packages` layout of bridged pip installs.
 */

import { execFile } from 'child_process';
import { dirname, join } from 'path';
import { promisify } from 'util';

import type { InstallDirectories, InstallLocation, InterpreterInfo } from '../types/index.js';
import { DIR_PATTERNS, MODPM_HOME_DIRS } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';
import { getModpmHome } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

const PROBE_SCRIPT = [
  'import json, os, sys',
  'base = getattr(sys, "base_prefix", getattr(sys, "real_prefix", sys.prefix))',
  'venv = hasattr(sys, "real_prefix") or sys.prefix != base or bool(os.environ.get("VIRTUAL_ENV"))',
  'print(json.dumps({"version": list(sys.version_info[:3]), "prefix": sys.prefix, "basePrefix": base, "inVirtualEnv": venv}))'
].join('\n');

export function defaultPythonExecutable(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'python' : 'python3';
}

function isVersionTriple(value: unknown): value is [number, number, number] {
  return Array.isArray(value) && value.length === 3 && value.every(part => Number.isInteger(part));
}

/**
 * Validate the JSON printed by the probe script.
 */
export function parseInterpreterInfo(executable: string, output: string): InterpreterInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    throw new ConfigError(`Unexpected output from interpreter probe of '${executable}'`, { output, error });
  }

  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigError(`Unexpected output from interpreter probe of '${executable}'`, { output });
  }
  const version = 'version' in raw ? raw.version : undefined;
  const prefix = 'prefix' in raw ? raw.prefix : undefined;
  const basePrefix = 'basePrefix' in raw ? raw.basePrefix : undefined;
  const inVirtualEnv = 'inVirtualEnv' in raw ? raw.inVirtualEnv : undefined;
  if (!isVersionTriple(version) || typeof prefix !== 'string' || typeof basePrefix !== 'string' || typeof inVirtualEnv !== 'boolean') {
    throw new ConfigError(`Unexpected output from interpreter probe of '${executable}'`, { output });
  }

  return { executable, version, prefix, basePrefix, inVirtualEnv };
}

/**
 * Ask the interpreter for its version, prefixes and whether it runs inside a
 * virtual environment.
 */
export async function probeInterpreter(executable: string): Promise<InterpreterInfo> {
  try {
    const { stdout } = await execFileAsync(executable, ['-c', PROBE_SCRIPT]);
    const info = parseInterpreterInfo(executable, stdout.trim());
    logger.debug('Probed interpreter', info);
    return info;
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not run Python interpreter '${executable}': ${reason}`, { executable });
  }
}

export interface DirectoryLayoutOptions {
  /** Project directory for `local` installs */
  cwd: string;
  modpmHome?: string;
  platform?: NodeJS.Platform;
}

function getLocationRoots(
  location: InstallLocation,
  interpreter: InterpreterInfo,
  options: DirectoryLayoutOptions,
  scriptsDir: string
): Pick<InstallDirectories, 'packages' | 'bin' | 'pipPrefix'> {
  switch (location) {
    case 'local': {
      const packages = join(options.cwd, DIR_PATTERNS.MODULES);
      return {
        packages,
        bin: join(packages, DIR_PATTERNS.BIN),
        pipPrefix: join(packages, DIR_PATTERNS.PIP)
      };
    }
    case 'global': {
      const home = options.modpmHome ?? getModpmHome();
      return {
        packages: join(home, MODPM_HOME_DIRS.MODULES),
        bin: join(home, MODPM_HOME_DIRS.BIN),
        pipPrefix: join(home, MODPM_HOME_DIRS.PIP)
      };
    }
    case 'root':
      return {
        packages: join(interpreter.prefix, 'share', 'modpm', 'modules'),
        bin: join(interpreter.prefix, scriptsDir),
        pipPrefix: interpreter.prefix
      };
  }
}

/**
 * Derive the directory set of an install location.
 */
export function getInstallDirectories(
  location: InstallLocation,
  interpreter: InterpreterInfo,
  options: DirectoryLayoutOptions
): InstallDirectories {
  const platform = options.platform ?? process.platform;
  const scriptsDir = platform === 'win32' ? 'Scripts' : 'bin';
  const { packages, bin, pipPrefix } = getLocationRoots(location, interpreter, options, scriptsDir);

  const [major, minor] = interpreter.version;
  const pipLib = platform === 'win32'
    ? join(pipPrefix, 'Lib', 'site-packages')
    : join(pipPrefix, 'lib', `python${major}.${minor}`, 'site-packages');

  return {
    packages,
    bin,
    pipPrefix,
    pipLib,
    pipBin: join(pipPrefix, scriptsDir),
    referenceDir: dirname(packages)
  };
}
