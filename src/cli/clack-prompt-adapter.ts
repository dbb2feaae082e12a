/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, TextPromptOptions } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function unlessCancelled<T>(result: T | symbol): T {
  if (clack.isCancel(result)) {
    clack.cancel('Operation cancelled.');
    throw new UserCancellationError('Operation cancelled by user');
  }
  return result;
}

export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false
      });
      return unlessCancelled(result);
    },

    async text(message: string, options: TextPromptOptions = {}): Promise<string> {
      const { validate } = options;
      const result = await clack.text({
        message,
        placeholder: options.placeholder ?? options.initial,
        defaultValue: options.initial,
        validate: validate ? (value: string | undefined) => validate(value || options.initial || '') : undefined
      });
      return unlessCancelled(result);
    }
  };
}
