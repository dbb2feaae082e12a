/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * Answers every prompt with its default. A text prompt without a default, or
 * whose default does not validate, cannot be answered and throws.
 */

import type { PromptPort, TextPromptOptions } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(message: string) {
    super(
      `Cannot prompt for "${message}" in non-interactive mode. ` +
      `Use specific flags or options to provide the required input.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(_message: string, initial?: boolean): Promise<boolean> {
    return initial ?? false;
  },

  async text(message: string, options?: TextPromptOptions): Promise<string> {
    const value = options?.initial;
    if (value === undefined || options?.validate?.(value) !== undefined) {
      throw new NonInteractivePromptError(message);
    }
    return value;
  }
};
