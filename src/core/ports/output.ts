/**
 * Output Port Interface
 *
 * User-facing progress and diagnostics of the install engine. The engine
 * never writes to the console itself; the CLI injects a terminal
 * implementation and tests inject a recording one.
 */

/**
 * Spinner shown while a download or clone is running.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Progress line ("Installing ...", "Skipping ...") */
  info(message: string): void;

  /** Start of a larger phase */
  step(message: string): void;

  /** Plain, unprefixed text such as a stack trace or a path list */
  message(message: string): void;

  success(message: string): void;

  /** A failure that aborts the current operation */
  error(message: string): void;

  /** A problem that does not change the outcome */
  warn(message: string): void;

  note(content: string, title?: string): void;

  spinner(): UnifiedSpinner;
}
