import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';
import { CloneFailedError } from './errors.js';

const execFileAsync = promisify(execFile);

export interface GitCloneOptions {
  url: string;
  ref?: string; // branch/tag/sha
  /** Clone submodules too */
  recursive?: boolean;
  /** Directory to clone into; must be absent or empty */
  destination: string;
}

/**
 * Clones a repository into a destination directory. Injected into the
 * installer so tests can stand in for git.
 */
export type GitCloner = (options: GitCloneOptions) => Promise<void>;

export function isSha(ref: string): boolean {
  return /^[0-9a-f]{7,40}$/i.test(ref);
}

function exitCodeOf(error: unknown): number | null {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

function stderrOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim();
  }
  return undefined;
}

export function buildCloneArgs(options: GitCloneOptions): string[] {
  const args = ['clone'];
  if (options.recursive) {
    args.push('--recursive');
  }
  if (options.ref && !isSha(options.ref)) {
    args.push('--depth', '1', '--branch', options.ref);
  }
  args.push(options.url, options.destination);
  return args;
}

async function runGit(executable: string, url: string, args: string[], cwd?: string): Promise<void> {
  try {
    await execFileAsync(executable, args, { cwd });
  } catch (error) {
    throw new CloneFailedError(url, exitCodeOf(error), stderrOf(error));
  }
}

/**
 * Create a cloner that runs the given git executable. A SHA ref is checked
 * out after a full clone; branch and tag refs are cloned directly.
 */
export function createGitCloner(executable: string = 'git'): GitCloner {
  return async (options: GitCloneOptions): Promise<void> => {
    await runGit(executable, options.url, buildCloneArgs(options));
    if (options.ref && isSha(options.ref)) {
      await runGit(executable, options.url, ['checkout', options.ref], options.destination);
    }
    logger.debug(`Cloned git repository ${options.url}${options.ref ? `@${options.ref}` : ''} to ${options.destination}`);
  };
}
