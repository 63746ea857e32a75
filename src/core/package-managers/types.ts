import type { ManagerKind, PackageId, RemoveOrphansResult } from '../../types/index.js';
import type { CommandRunner } from '../ports/command-runner.js';
import type { Highlighter } from '../ports/highlighter.js';

/**
 * The six operations pkgdeck performs against one concrete package manager.
 * Identifier lists are always passed to the backend in a single invocation.
 */
export interface PackageManagerAdapter {
  readonly kind: ManagerKind;

  install(ids: readonly PackageId[]): Promise<void>;

  remove(ids: readonly PackageId[]): Promise<void>;

  /**
   * Lazy and restartable: every iteration runs the backend query again.
   */
  search(query: string): AsyncIterable<string>;

  syncIndex(): Promise<void>;

  upgradeAll(): Promise<void>;

  /**
   * Computes the orphan set first and removes it in one call, or does
   * nothing when the set is empty.
   */
  removeOrphans(): Promise<RemoveOrphansResult>;
}

export interface AdapterOptions {
  runner: CommandRunner;
  /** Pass the backend's non-interactive confirmation flag. */
  assumeYes: boolean;
  /** `null` when no highlighting is possible; search output passes through. */
  highlighter: Highlighter | null;
  /** Non-fatal notices for the user. */
  warn: (message: string) => void;
}
