/**
 * Execution Context Types
 *
 * Type definitions for the execution context that carries directory
 * resolution and ports through a command.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

/**
 * ExecutionContext - Single source of truth for directory resolution
 *
 * Strictly separates:
 * - sourceCwd: Where we resolve input arguments (local paths, archives)
 * - packageDir: The current package (its modpm.yml, local modpm_modules/)
 */
export interface ExecutionContext {
  /**
   * Absolute path to the original working directory.
   * Used for resolving input arguments (e.g., ./package, ../dist/pkg.tar.gz).
   */
  sourceCwd: string;

  /**
   * Absolute path to the current package directory.
   * - For normal commands: current working directory
   * - For --cwd / --packagedir: the specified directory
   */
  packageDir: string;

  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Prompt port for interactive questions. When not provided, prompts
   * answer with their defaults.
   */
  prompt?: PromptPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /**
   * --cwd flag: Explicit working directory
   */
  cwd?: string;

  /**
   * --packagedir flag: Explicit package directory (relative to cwd)
   */
  packageDir?: string;
}
