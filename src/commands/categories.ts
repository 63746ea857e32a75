import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext, programOptions } from '../cli/context.js';
import { loadCatalog } from '../core/catalog/category-catalog.js';

export function setupCategoriesCommand(program: Command): void {
  program
    .command('categories')
    .alias('ls')
    .description('List package categories in install order')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const ctx = await createCliExecutionContext(programOptions(command));
      const catalog = await loadCatalog(ctx.config.catalogPath);
      for (const category of catalog.categories()) {
        console.log(`${category.id}: ${category.packages.join(' ')}`);
      }
    }));
}
