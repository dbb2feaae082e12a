/**
 * Script Maker
 *
 * Writes executable entry points into a bin directory. POSIX systems get a
 * `#!/bin/sh` script, Windows a `.cmd` batch file. Both prepend the
 * configured PYTHONPATH and PATH extras before handing over to the target.
 */

import { promises as fs } from 'fs';
import { join } from 'path';

import { PY_VERSION_PLACEHOLDER } from '../../constants/index.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { quoteArgument } from '../../utils/process.js';

const shellQuote = (value: string): string => quoteArgument(value, 'linux');
const cmdQuote = (value: string): string => quoteArgument(value, 'win32');

export interface ScriptMakerOptions {
  /** Directory the scripts are written to */
  directory: string;
  /** Command that runs a module file, e.g. `modpy` */
  runtimeCommand: string;
  pythonPath?: string[];
  path?: string[];
  platform?: NodeJS.Platform;
}

/** Environment variable through which entry scripts pass the reference directory. */
export const REFERENCE_DIR_VARIABLE = 'MODPY_REFERENCE_DIR';

/**
 * Concrete script names for a `bin` entry. A `${py}` placeholder expands to
 * nothing, the major and the major.minor interpreter version.
 */
export function expandScriptNames(name: string, version: readonly [number, number, number]): string[] {
  if (!name.includes(PY_VERSION_PLACEHOLDER)) {
    return [name];
  }
  const [major, minor] = version;
  const expanded = ['', `${major}`, `${major}.${minor}`].map(value => name.split(PY_VERSION_PLACEHOLDER).join(value));
  return [...new Set(expanded)];
}

export class ScriptMaker {
  readonly directory: string;
  private readonly runtimeCommand: string;
  private readonly pythonPath: string[];
  private readonly path: string[];
  private readonly platform: NodeJS.Platform;

  constructor(options: ScriptMakerOptions) {
    this.directory = options.directory;
    this.runtimeCommand = options.runtimeCommand;
    this.pythonPath = [...(options.pythonPath ?? [])];
    this.path = [...(options.path ?? [])];
    this.platform = options.platform ?? process.platform;
  }

  private get isWindows(): boolean {
    return this.platform === 'win32';
  }

  /**
   * Script that runs `command` with the caller's arguments appended.
   */
  async makeWrapper(name: string, command: string[]): Promise<string[]> {
    return [await this.writeScript(name, {}, command)];
  }

  /**
   * Script that runs `targetFile` on the module runtime, resolving modules
   * relative to `referenceDir`.
   */
  async makeEntryScript(name: string, targetFile: string, referenceDir: string): Promise<string[]> {
    return [
      await this.writeScript(name, { [REFERENCE_DIR_VARIABLE]: referenceDir }, [this.runtimeCommand, targetFile])
    ];
  }

  private async writeScript(name: string, variables: Record<string, string>, command: string[]): Promise<string> {
    const filename = join(this.directory, this.isWindows ? `${name}.cmd` : name);
    const content = this.isWindows ? this.renderCmd(variables, command) : this.renderSh(variables, command);
    await writeTextFile(filename, content);
    if (!this.isWindows) {
      await fs.chmod(filename, 0o755);
    }
    logger.debug(`Wrote script ${filename}`);
    return filename;
  }

  private renderSh(variables: Record<string, string>, command: string[]): string {
    const lines = ['#!/bin/sh'];
    for (const [key, value] of Object.entries(variables)) {
      lines.push(`${key}=${shellQuote(value)}`, `export ${key}`);
    }
    if (this.pythonPath.length > 0) {
      const extra = shellQuote(this.pythonPath.join(':'));
      lines.push(`PYTHONPATH=${extra}\${PYTHONPATH:+:$PYTHONPATH}`, 'export PYTHONPATH');
    }
    if (this.path.length > 0) {
      lines.push(`PATH=${shellQuote(this.path.join(':'))}:"$PATH"`, 'export PATH');
    }
    lines.push(`exec ${command.map(shellQuote).join(' ')} "$@"`);
    return `${lines.join('\n')}\n`;
  }

  private renderCmd(variables: Record<string, string>, command: string[]): string {
    const lines = ['@echo off', 'setlocal'];
    for (const [key, value] of Object.entries(variables)) {
      lines.push(`set "${key}=${value}"`);
    }
    if (this.pythonPath.length > 0) {
      lines.push(`set "PYTHONPATH=${this.pythonPath.join(';')};%PYTHONPATH%"`);
    }
    if (this.path.length > 0) {
      lines.push(`set "PATH=${this.path.join(';')};%PATH%"`);
    }
    lines.push(`${command.map(cmdQuote).join(' ')} %*`);
    return `${lines.join('\r\n')}\r\n`;
  }
}
