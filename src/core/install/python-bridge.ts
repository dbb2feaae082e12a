/**
 * Bridge to pip for interpreter-level (`pip-dependencies`) requirements.
 *
 * pip runs as `<python> -m pip install ...` with a prefix (or target) derived
 * from the install location, so packages land in the directory set the
 * entry scripts put on PYTHONPATH.
 */

import { promises as fs } from 'fs';
import { extname, join, parse as parsePath } from 'path';

import type { InstallDirectories, InstallLocation, PackageIdentity } from '../../types/index.js';
import { getErrorCode, isDirectory, listFiles, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { runProcess } from '../../utils/process.js';
import type { OutputPort } from '../ports/output.js';
import type { ScriptMaker } from '../scripts/script-maker.js';

const PIP_NAME_REGEX = /^([A-Za-z0-9][A-Za-z0-9._-]*)(\[[^\]]*\])?\s*(.*)$/;

export interface PipRequirement {
  /** Distribution name, extras included (`requests[socks]`) */
  name: string;
  /** PEP 440 specifier, empty for any version */
  specifier: string;
}

/**
 * Split a pip requirement line into name and specifier. Returns null for
 * lines that are not name-based (URLs, paths, options), which pip takes
 * verbatim.
 */
export function parsePipRequirement(line: string): PipRequirement | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('-') || trimmed.includes('://') || /[\\/]/.test(trimmed)) {
    return null;
  }
  const match = PIP_NAME_REGEX.exec(trimmed);
  if (!match) {
    return null;
  }
  const [, name, extras = '', specifier = ''] = match;
  if (specifier && !/^[<>=!~;@]/.test(specifier)) {
    return null;
  }
  return { name: `${name}${extras}`, specifier: specifier.replace(/\s+/g, '') };
}

export interface PipArgumentOptions {
  location: InstallLocation;
  dirs: Pick<InstallDirectories, 'pipPrefix' | 'pipLib'>;
  useTargetOption?: boolean;
  ignoreInstalled?: boolean;
  upgrade?: boolean;
  verbose?: boolean;
}

/**
 * Arguments following `pip install`.
 */
export function buildPipArguments(
  deps: Readonly<Record<string, string>>,
  extraArgs: readonly string[],
  options: PipArgumentOptions
): string[] {
  const args: string[] = [];
  if (options.location === 'local' || options.location === 'global') {
    if (options.useTargetOption) {
      args.push('--target', options.dirs.pipLib);
    } else {
      args.push('--prefix', options.dirs.pipPrefix);
    }
  }
  args.push(...extraArgs);
  for (const [name, specifier] of Object.entries(deps)) {
    args.push(`${name}${specifier}`);
  }
  if (options.ignoreInstalled) {
    args.push('--ignore-installed');
  }
  if (options.upgrade) {
    args.push('--upgrade');
  }
  if (options.verbose) {
    args.push('--verbose');
  }
  return args;
}

/**
 * Runs `pip install` with the given arguments and resolves with its exit code.
 */
export type PipRunner = (args: string[]) => Promise<number | null>;

export function createPipRunner(pythonExecutable: string): PipRunner {
  return async args => {
    const { exitCode } = await runProcess(pythonExecutable, ['-m', 'pip', 'install', ...args], { inherit: true });
    return exitCode;
  };
}

/**
 * PEP 503 name normalization; `.dist-info` directories use `_` where the
 * distribution name may have `-` or `.`.
 */
export function normalizeDistributionName(name: string): string {
  return name.replace(/\[.*\]$/, '').toLowerCase().replace(/[-_.]+/g, '-');
}

function parseMetadata(content: string): PackageIdentity | null {
  let name: string | undefined;
  let version: string | undefined;
  for (const line of content.split(/\r?\n/)) {
    if (!line) {
      break; // end of the header block
    }
    if (name === undefined && line.startsWith('Name:')) {
      name = line.slice('Name:'.length).trim();
    } else if (version === undefined && line.startsWith('Version:')) {
      version = line.slice('Version:'.length).trim();
    }
  }
  return name && version ? { name, version } : null;
}

/**
 * Name and version of an installed distribution, read from its
 * `*.dist-info/METADATA` under `libDir`.
 */
export async function findDistInfo(libDir: string, distribution: string): Promise<PackageIdentity | null> {
  let entries: string[];
  try {
    entries = await fs.readdir(libDir);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const wanted = normalizeDistributionName(distribution);
  for (const entry of entries) {
    if (!entry.endsWith('.dist-info')) {
      continue;
    }
    const stem = entry.slice(0, -'.dist-info'.length);
    const dash = stem.lastIndexOf('-');
    const distName = dash === -1 ? stem : stem.slice(0, dash);
    if (normalizeDistributionName(distName) !== wanted) {
      continue;
    }

    const metadataPath = join(libDir, entry, 'METADATA');
    try {
      return parseMetadata(await readTextFile(metadataPath));
    } catch (error) {
      logger.debug(`Unreadable metadata ${metadataPath}`, error);
      return null;
    }
  }
  return null;
}

export interface RelinkOptions {
  pipBin: string;
  scriptMaker: ScriptMaker;
  output: OutputPort;
  platform?: NodeJS.Platform;
  /** PATHEXT-style executable extensions, lower case (Windows only) */
  executableExtensions?: string[];
}

/**
 * Create a wrapper in the bin directory for every program pip installed
 * into its own bin directory. Returns the paths written.
 */
export async function relinkPipScripts(options: RelinkOptions): Promise<string[]> {
  if (!(await isDirectory(options.pipBin))) {
    return [];
  }

  const platform = options.platform ?? process.platform;
  const extensions = options.executableExtensions ?? (process.env.PATHEXT ?? '.com;.exe;.bat;.cmd').toLowerCase().split(';');
  const files = (await listFiles(options.pipBin)).sort();
  const written: string[] = [];

  options.output.info('Relinking pip-installed proxy scripts ...');
  for (const file of files) {
    const target = join(options.pipBin, file);
    let scriptName = file;
    let prefix: string[] = [];

    if (platform === 'win32') {
      const ext = extname(file).toLowerCase();
      scriptName = parsePath(file).name;
      if (!ext || !extensions.includes(ext)) {
        continue;
      }
      if (ext !== '.exe') {
        // An .exe of the same program takes precedence
        if (files.some(other => other.toLowerCase() === `${scriptName.toLowerCase()}.exe`)) {
          continue;
        }
        prefix = ['cmd', '/C'];
      }
    }

    options.output.info(`  Creating ${scriptName} from ${target} ...`);
    written.push(...(await options.scriptMaker.makeWrapper(scriptName, [...prefix, target])));
  }
  return written;
}
