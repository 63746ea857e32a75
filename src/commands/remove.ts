import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, ensureSupportedManager, programOptions } from '../cli/context.js';

async function removeCommand(packages: string[], command: Command): Promise<void> {
  const ctx = await createCliExecutionContext(programOptions(command));
  if (!ensureSupportedManager(ctx)) {
    return;
  }

  ctx.output.step(`Removing ${packages.join(' ')}`);
  await ctx.adapter.remove(packages);
  ctx.output.success(`Removed ${packages.length} package(s)`);
}

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .alias('rm')
    .description('Remove packages in one batched call')
    .argument('<packages...>', 'packages to remove')
    .action(withErrorHandling(async (packages: string[], _options: object, command: Command) => {
      await removeCommand(packages, command);
    }));
}
