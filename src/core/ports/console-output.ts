/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log implementation of OutputPort, used when no interactive
 * terminal is attached.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.error(message);
  },

  warn(message: string): void {
    console.warn(message);
  },

  note(content: string, title?: string): void {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? current}`);
      },
      message(text: string) {
        current = text;
      }
    };
  }
};
