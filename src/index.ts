#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupInstallCommand } from './commands/install.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupSearchCommand } from './commands/search.js';
import { setupSyncCommand } from './commands/sync.js';
import { setupUpgradeCommand } from './commands/upgrade.js';
import { setupAutoremoveCommand } from './commands/autoremove.js';
import { setupSelectCommand } from './commands/select.js';
import { setupCategoriesCommand } from './commands/categories.js';

/**
 * pkgdeck CLI - Main entry point
 *
 * One front end for apt-get and pacman, plus an interactive bulk installer.
 */

const program = new Command();

program
  .name('pkgdeck')
  .description('Package manager front end and interactive bulk installer')
  .version(getVersion())
  .option('--manager <name>', 'package manager backend (apt-get, pacman); overrides PKGDECK_MANAGER')
  .option('--catalog <path>', 'category catalog (YAML); overrides PKGDECK_CATALOG')
  .option('--dialog <name>', 'menu renderer: clack, dialog or whiptail')
  .option('-y, --yes', 'answer yes to backend confirmations')
  .configureHelp({ sortSubcommands: true });

// === BACKEND COMMANDS ===
setupInstallCommand(program);
setupRemoveCommand(program);
setupSearchCommand(program);
setupSyncCommand(program);
setupUpgradeCommand(program);
setupAutoremoveCommand(program);

// === BULK INSTALLER ===
setupSelectCommand(program);
setupCategoriesCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with PKGDECK_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with PKGDECK_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { program };
