#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupRuntimesCommand } from './commands/runtimes.js';
import { setupPackagesCommand } from './commands/packages.js';
import { setupInspectCommand } from './commands/inspect.js';
import { setupRemoteCommand } from './commands/remote.js';
import { setupUpdatesCommand } from './commands/updates.js';
import { setupCompareCommand } from './commands/compare.js';
import { setupFieldsCommand } from './commands/fields.js';
import { setupSnapshotCommand } from './commands/snapshot.js';
import { setupConfigCommand } from './commands/config.js';

/**
 * pkgsight CLI - Main entry point
 *
 * Inspects installed package environments and reconciles them with the
 * public package index.
 */

const program = new Command();

program
  .name('pkgsight')
  .description('pkgsight - inspect installed packages and compare them with published releases')
  .version(getVersion())
  .option('--root <dir>', 'directory holding the installed runtimes')
  .option('--workers <n>', 'maximum concurrent workers')
  .option('--verbose', 'show debug logging')
  .option('--json', 'print results as JSON')
  .configureHelp({ sortSubcommands: true });

// === LOCAL ENVIRONMENT ===
setupRuntimesCommand(program);
setupPackagesCommand(program);
setupInspectCommand(program);
setupCompareCommand(program);
setupSnapshotCommand(program);
setupFieldsCommand(program);

// === PUBLISHED RELEASES ===
setupRemoteCommand(program);
setupUpdatesCommand(program);

// === CONFIGURATION ===
setupConfigCommand(program);

program.hook('preAction', () => {
  const opts = program.opts();
  if (opts.verbose === true) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Running pkgsight ${getVersion()}`, { argv: process.argv.slice(2) });
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run again with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run again with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // No arguments: show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('pkgsight')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
