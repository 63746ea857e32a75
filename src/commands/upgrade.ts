import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, ensureSupportedManager, programOptions } from '../cli/context.js';

export function setupUpgradeCommand(program: Command): void {
  program
    .command('upgrade')
    .description('Upgrade every installed package')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const ctx = await createCliExecutionContext(programOptions(command));
      if (!ensureSupportedManager(ctx)) {
        return;
      }
      ctx.output.step('Upgrading installed packages');
      await ctx.adapter.upgradeAll();
      ctx.output.success('Upgrade complete');
    }));
}
