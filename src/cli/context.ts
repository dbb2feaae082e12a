/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations
 * (Clack output adapter, Clack prompt adapter).
 *
 * Command handlers use this instead of calling createExecutionContext()
 * directly so that ports are injected.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  return { output: consoleOutput, prompt: nonInteractivePrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true && process.stdout.isTTY === true;
  return isTTY && env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 *
 * In interactive mode (TTY): uses Clack for output and prompts.
 * In non-interactive mode (CI/piped): plain console output, prompts answer with defaults.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  const ports = getCliPorts(detectInteractive(options.interactive));

  ctx.output = ports.output;
  ctx.prompt = ports.prompt;

  return ctx;
}
