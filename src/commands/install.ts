import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, ensureSupportedManager, programOptions } from '../cli/context.js';

async function installCommand(packages: string[], command: Command): Promise<void> {
  const ctx = await createCliExecutionContext(programOptions(command));
  if (!ensureSupportedManager(ctx)) {
    return;
  }

  ctx.output.step(`Installing ${packages.join(' ')}`);
  await ctx.adapter.install(packages);
  ctx.output.success(`Installed ${packages.length} package(s)`);
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install packages in one batched call')
    .argument('<packages...>', 'packages to install')
    .action(withErrorHandling(async (packages: string[], _options: object, command: Command) => {
      await installCommand(packages, command);
    }));
}
