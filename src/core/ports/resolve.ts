/**
 * Port Resolution Helpers
 *
 * Resolve the ports of an ExecutionContext, falling back to the plain
 * console implementations when a context carries none.
 */

import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

export function resolvePrompt(ctx?: { prompt?: PromptPort }): PromptPort {
  return ctx?.prompt ?? nonInteractivePrompt;
}
