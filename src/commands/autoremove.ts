import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, ensureSupportedManager, programOptions } from '../cli/context.js';

async function autoremoveCommand(command: Command): Promise<void> {
  const ctx = await createCliExecutionContext(programOptions(command));
  if (!ensureSupportedManager(ctx)) {
    return;
  }

  const { removed } = await ctx.adapter.removeOrphans();
  if (removed.length === 0) {
    ctx.output.info('Nothing to do: no orphaned packages.');
    return;
  }
  ctx.output.success(`Removed ${removed.length} orphaned package(s): ${removed.join(' ')}`);
}

export function setupAutoremoveCommand(program: Command): void {
  program
    .command('autoremove')
    .description('Remove packages no longer required by anything installed')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      await autoremoveCommand(command);
    }));
}
