import type { CategoryReportEntry, InstallReport } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';

export function formatReportEntry(entry: CategoryReportEntry): string {
  const { categoryId, outcome } = entry;
  switch (outcome.status) {
    case 'succeeded':
      return `${categoryId}: ${outcome.packages.length} package(s) installed`;
    case 'failed':
      return `${categoryId}: ${outcome.reason}`;
    case 'skipped-empty':
      return `${categoryId}: nothing selected`;
  }
}

export function summarizeReport(report: InstallReport): string {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  for (const { outcome } of report.entries) {
    if (outcome.status === 'succeeded') succeeded++;
    else if (outcome.status === 'failed') failed++;
    else skipped++;
  }
  return `${succeeded} succeeded, ${failed} failed, ${skipped} skipped`;
}

/**
 * Print one line per category, then a summary.
 */
export function reportInstallResult(report: InstallReport, output: OutputPort): void {
  for (const entry of report.entries) {
    const line = formatReportEntry(entry);
    switch (entry.outcome.status) {
      case 'succeeded':
        output.success(line);
        break;
      case 'failed':
        output.error(line);
        break;
      case 'skipped-empty':
        output.message(line);
        break;
    }
  }
  output.info(summarizeReport(report));
}
