import type { Command } from 'commander';

/** Options declared on the root program */
export type GlobalOptions = {
  cwd?: string;
  verbose?: boolean;
};

export interface LocationOptions {
  global?: boolean;
  root?: boolean;
  system?: boolean;
}

export function addLocationOptions(command: Command): Command {
  return command
    .option('-g, --global', 'use the per-user package tree')
    .option('--root', 'use the interpreter prefix (system-wide)')
    .option('--system', 'alias for --root');
}

/** Collapses `--system` into `--root`. */
export function toLocationFlags(options: LocationOptions): { global?: boolean; root?: boolean } {
  return { global: options.global, root: options.root || options.system };
}
