/**
 * Execution Context Module
 *
 * Central module for directory resolution of a command.
 *
 * This is the single source of truth for determining:
 * - Where to resolve input arguments (sourceCwd)
 * - Which package the command works on (packageDir)
 */

import { resolve } from 'path';
import { stat } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ValidationError } from '../utils/errors.js';
import { getErrorCode } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * sourceCwd is --cwd when given, else process.cwd(); packageDir is
 * --packagedir resolved against sourceCwd, else sourceCwd itself.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();
  const packageDir = options.packageDir ? resolve(sourceCwd, options.packageDir) : sourceCwd;

  const context: ExecutionContext = { sourceCwd, packageDir };
  await assertDirectory(context.sourceCwd, '--cwd');
  await assertDirectory(context.packageDir, '--packagedir');

  logger.debug('Created execution context', { sourceCwd, packageDir });
  return context;
}

async function assertDirectory(path: string, flag: string): Promise<void> {
  try {
    const stats = await stat(path);
    if (!stats.isDirectory()) {
      throw new ValidationError(`Invalid ${flag} '${path}': not a directory`);
    }
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    if (getErrorCode(error) === 'ENOENT') {
      throw new ValidationError(`Invalid ${flag} '${path}': directory does not exist`);
    }
    throw new ValidationError(
      `Invalid ${flag} '${path}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
