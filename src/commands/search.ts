import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, ensureSupportedManager, programOptions } from '../cli/context.js';

async function searchCommand(query: string, command: Command): Promise<void> {
  const ctx = await createCliExecutionContext(programOptions(command));
  if (!ensureSupportedManager(ctx)) {
    return;
  }

  // stdout stays clean for piping
  for await (const line of ctx.adapter.search(query)) {
    console.log(line);
  }
}

export function setupSearchCommand(program: Command): void {
  program
    .command('search')
    .alias('s')
    .description('Search the package index, highlighting matches')
    .argument('<query>', 'text to search for')
    .action(withErrorHandling(async (query: string, _options: object, command: Command) => {
      await searchCommand(query, command);
    }));
}
