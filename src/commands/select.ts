import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, createDialogProvider, ensureSupportedManager, programOptions } from '../cli/context.js';
import { loadCatalog } from '../core/catalog/category-catalog.js';
import { createTempFileChannelFactory } from '../core/dialog/temp-file-channel.js';
import { runBulkInstallFlow } from '../core/install/bulk-install.js';
import { hasFailures } from '../core/install/install-orchestrator.js';

async function selectCommand(command: Command): Promise<void> {
  const ctx = await createCliExecutionContext(programOptions(command));
  if (!ensureSupportedManager(ctx)) {
    return;
  }
  const catalog = await loadCatalog(ctx.config.catalogPath);

  const outcome = await runBulkInstallFlow(ctx, {
    catalog,
    dialog: createDialogProvider(ctx.config, ctx.runner),
    channels: createTempFileChannelFactory()
  });

  switch (outcome.status) {
    case 'unsupported-manager':
    case 'dialog-unavailable':
      // already warned
      process.exitCode = 1;
      break;
    case 'completed':
      if (hasFailures(outcome.report)) {
        process.exitCode = 1;
      }
      break;
    case 'aborted':
      break;
  }
}

export function setupSelectCommand(program: Command): void {
  program
    .command('select')
    .description('Interactively pick packages by category and install them')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      await selectCommand(command);
    }));
}
