import type { CategoryReportEntry, InstallReport, SelectionSet } from '../../types/index.js';
import type { CategoryCatalog } from '../catalog/category-catalog.js';
import type { PackageManagerAdapter } from '../package-managers/types.js';
import { PartialInstallFailure, UnsupportedManagerError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface InstallOrchestratorHooks {
  /** Called before a category's batched install starts. */
  onCategoryStart?: (categoryId: string, packages: string[]) => void;
}

/**
 * Install a selection one category at a time, in catalog order, with a
 * single batched call per non-empty category. A failing category is
 * recorded and the remaining categories are still attempted.
 */
export async function runInstallOrchestrator(
  selection: SelectionSet,
  catalog: CategoryCatalog,
  adapter: PackageManagerAdapter,
  hooks: InstallOrchestratorHooks = {}
): Promise<InstallReport> {
  const entries: CategoryReportEntry[] = [];

  for (const category of catalog.categories()) {
    const packages = selection.get(category.id) ?? [];
    if (packages.length === 0) {
      entries.push({ categoryId: category.id, outcome: { status: 'skipped-empty' } });
      continue;
    }

    hooks.onCategoryStart?.(category.id, packages);
    try {
      await adapter.install(packages);
      entries.push({ categoryId: category.id, outcome: { status: 'succeeded', packages } });
    } catch (error) {
      // Misconfiguration is fatal for the whole run, not one category
      if (error instanceof UnsupportedManagerError) {
        throw error;
      }
      const failure = new PartialInstallFailure(
        category.id,
        error instanceof Error ? error.message : String(error)
      );
      logger.debug(failure.message, { packages });
      entries.push({
        categoryId: category.id,
        outcome: { status: 'failed', packages, reason: failure.reason }
      });
    }
  }

  return { entries };
}

export function hasFailures(report: InstallReport): boolean {
  return report.entries.some(entry => entry.outcome.status === 'failed');
}
