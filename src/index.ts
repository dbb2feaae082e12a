#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupInstallCommand } from './commands/install.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupDirsCommand } from './commands/dirs.js';
import { setupBinCommand } from './commands/bin.js';
import { setupRunCommand } from './commands/run.js';
import { setupInitCommand } from './commands/init.js';

/**
 * modpm CLI - Main entry point
 *
 * Package manager for the modpy module runtime.
 */

const program = new Command();

program
  .name('modpm')
  .description('modpm - package manager for the modpy module runtime')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('-v, --verbose', 'print debug logging (and pass --verbose to pip)')
  .configureHelp({ sortSubcommands: true });

// === PACKAGE COMMANDS ===
setupInstallCommand(program);
setupUninstallCommand(program);
setupInitCommand(program);
setupRunCommand(program);

// === DIRECTORIES ===
setupDirsCommand(program);
setupBinCommand(program);

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error(`fatal: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('fatal: an unexpected error occurred, run with --verbose for details');
  process.exit(1);
});

export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error(`fatal: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

// Export the program for testing purposes
export { program };
