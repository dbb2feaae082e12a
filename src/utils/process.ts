import { spawn, type StdioOptions } from 'child_process';

import { logger } from './logger.js';

export interface ProcessRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
  /** Run `command` through the platform shell */
  shell?: boolean;
}

/**
 * Spawn a subprocess and wait for it to close. A spawn failure (missing
 * executable, bad cwd) rejects; a non-zero exit resolves with its code.
 */
export function runProcess(command: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessRunResult> {
  const stdio: StdioOptions = options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'];
  logger.debug(`Running: ${command} ${args.join(' ')}`, { cwd: options.cwd });

  return new Promise<ProcessRunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio,
      shell: options.shell ?? false
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.once('error', reject);

    child.once('close', (code, signal) => {
      resolve({ exitCode: code, signal, stdout, stderr });
    });
  });
}

/**
 * Quote one argument for the platform shell.
 */
export function quoteArgument(value: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
