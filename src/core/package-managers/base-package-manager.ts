import type { ManagerKind, PackageId, RemoveOrphansResult } from '../../types/index.js';
import type { CapturedOutput, CommandInvocation } from '../ports/command-runner.js';
import { formatInvocation } from '../ports/command-runner.js';
import type { AdapterOptions, PackageManagerAdapter } from './types.js';
import { SearchResults } from './search-results.js';
import { CommandFailedError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Shared behaviour for command-line package managers. Subclasses only
 * describe which invocations implement each operation.
 */
export abstract class BasePackageManager implements PackageManagerAdapter {
  abstract readonly kind: ManagerKind;

  private warnedNoHighlighter = false;

  constructor(protected readonly options: AdapterOptions) {}

  protected abstract installInvocation(ids: readonly PackageId[]): CommandInvocation;
  protected abstract removeInvocation(ids: readonly PackageId[]): CommandInvocation;
  protected abstract searchInvocation(query: string): CommandInvocation;
  protected abstract syncInvocation(): CommandInvocation;
  protected abstract upgradeInvocation(): CommandInvocation;
  protected abstract orphanQueryInvocation(): CommandInvocation;

  /**
   * Turn the orphan query's output into package ids. Throws when the exit
   * status means the query itself failed.
   */
  protected abstract parseOrphans(output: CapturedOutput, invocation: CommandInvocation): PackageId[];

  /**
   * Whether a search that printed nothing and exited with `exitCode` simply
   * found no matches.
   */
  protected searchExitIsEmpty(exitCode: number | null): boolean {
    return exitCode === 0;
  }

  async install(ids: readonly PackageId[]): Promise<void> {
    this.requireIds('install', ids);
    await this.execute(this.installInvocation(ids));
  }

  async remove(ids: readonly PackageId[]): Promise<void> {
    this.requireIds('remove', ids);
    await this.execute(this.removeInvocation(ids));
  }

  search(query: string): AsyncIterable<string> {
    const invocation = this.searchInvocation(query);
    const highlighter = this.options.highlighter;
    if (!highlighter && !this.warnedNoHighlighter) {
      this.warnedNoHighlighter = true;
      this.options.warn('Search highlighting is unavailable; showing plain output.');
    }
    return new SearchResults(query, () => this.searchLines(invocation), highlighter);
  }

  async syncIndex(): Promise<void> {
    await this.execute(this.syncInvocation());
  }

  async upgradeAll(): Promise<void> {
    await this.execute(this.upgradeInvocation());
  }

  async removeOrphans(): Promise<RemoveOrphansResult> {
    const query = this.orphanQueryInvocation();
    logger.debug(`Computing orphans: ${formatInvocation(query)}`);
    const orphans = this.parseOrphans(await this.options.runner.capture(query), query);

    if (orphans.length === 0) {
      return { removed: [] };
    }

    await this.execute(this.removeInvocation(orphans));
    return { removed: orphans };
  }

  protected failed(invocation: CommandInvocation, output: CapturedOutput): CommandFailedError {
    return new CommandFailedError(formatInvocation(invocation), output.exitCode, output.stderr.trim());
  }

  private async *searchLines(invocation: CommandInvocation): AsyncGenerator<string> {
    let count = 0;
    try {
      for await (const line of this.options.runner.lines(invocation)) {
        count++;
        yield line;
      }
    } catch (error) {
      if (count === 0 && error instanceof CommandFailedError && this.searchExitIsEmpty(error.exitCode)) {
        logger.debug(`No matches: ${formatInvocation(invocation)}`, { exitCode: error.exitCode });
        return;
      }
      throw error;
    }
  }

  private async execute(invocation: CommandInvocation): Promise<void> {
    logger.debug(`Running: ${formatInvocation(invocation)}`, { privileged: invocation.privileged });
    await this.options.runner.run(invocation);
  }

  private requireIds(operation: string, ids: readonly PackageId[]): void {
    if (ids.length === 0) {
      throw new ValidationError(`${operation} needs at least one package`);
    }
  }
}

/**
 * Split command output into trimmed, non-empty lines.
 */
export function outputLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
