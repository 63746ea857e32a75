import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, ensureSupportedManager, programOptions } from '../cli/context.js';

export function setupSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Refresh the package index')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const ctx = await createCliExecutionContext(programOptions(command));
      if (!ensureSupportedManager(ctx)) {
        return;
      }
      ctx.output.step('Refreshing package index');
      await ctx.adapter.syncIndex();
      ctx.output.success('Package index is up to date');
    }));
}
