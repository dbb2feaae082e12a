/**
 * Prompt Port Interface
 *
 * Interactive questions asked by commands such as `modpm init`.
 *
 * Implementations:
 *   - createClackPrompt (CLI): routes to @clack/prompts
 *   - nonInteractivePrompt (CI/default): answers with the defaults
 */

export interface TextPromptOptions {
  initial?: string;
  placeholder?: string;
  /** Return an error message to reject the value */
  validate?: (value: string) => string | undefined;
}

export interface PromptPort {
  confirm(message: string, initial?: boolean): Promise<boolean>;

  text(message: string, options?: TextPromptOptions): Promise<string>;
}
