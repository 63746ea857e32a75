import type { ExecutionContext, InstallReport } from '../../types/index.js';
import type { CategoryCatalog } from '../catalog/category-catalog.js';
import type { DialogProvider, ResultChannelFactory } from '../ports/dialog.js';
import { SelectionSession, type SessionResult } from '../selection/selection-session.js';
import { runInstallOrchestrator } from './install-orchestrator.js';
import { reportInstallResult } from './install-reporting.js';
import { DialogUnavailableError } from '../../utils/errors.js';

export interface BulkInstallOptions {
  catalog: CategoryCatalog;
  dialog: DialogProvider;
  channels: ResultChannelFactory;
}

export type BulkInstallOutcome =
  | { status: 'unsupported-manager' }
  | { status: 'dialog-unavailable' }
  | { status: 'aborted' }
  | { status: 'completed'; report: InstallReport };

/**
 * Interactive bulk install: pick packages per category, confirm, then
 * install category by category. Misconfiguration and a missing dialog end
 * the flow with a warning before anything is installed.
 */
export async function runBulkInstallFlow(
  ctx: Pick<ExecutionContext, 'config' | 'output' | 'adapter'>,
  options: BulkInstallOptions
): Promise<BulkInstallOutcome> {
  const { output } = ctx;

  if (ctx.config.manager.kind === 'unsupported') {
    output.warn(`No supported package manager configured (got '${ctx.config.manager.raw}'); nothing to install.`);
    return { status: 'unsupported-manager' };
  }

  const session = new SelectionSession(options);
  let result: SessionResult;
  try {
    result = await session.run();
  } catch (error) {
    if (error instanceof DialogUnavailableError) {
      output.warn(error.message);
      return { status: 'dialog-unavailable' };
    }
    throw error;
  }

  if (result.state === 'aborted') {
    output.info('Installation cancelled.');
    return { status: 'aborted' };
  }

  const report = await runInstallOrchestrator(result.selection, options.catalog, ctx.adapter, {
    onCategoryStart: (categoryId, packages) => output.step(`Installing ${categoryId}: ${packages.join(' ')}`),
  });
  reportInstallResult(report, output);
  return { status: 'completed', report };
}
