/**
 * Execution Context Types
 *
 * Everything a command needs, built once at startup and passed by reference.
 */

import type { PkgdeckConfig } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { CommandRunner } from '../core/ports/command-runner.js';
import type { PackageManagerAdapter } from '../core/package-managers/types.js';

/**
 * ExecutionContext - the single configuration value and the collaborators
 * derived from it.
 */
export interface ExecutionContext {
  /**
   * Frozen configuration. No component reads the environment on its own.
   */
  config: PkgdeckConfig;

  /**
   * Output port for all user-facing messages.
   */
  output: OutputPort;

  /**
   * Runner for every external command, privileged or not.
   */
  runner: CommandRunner;

  /**
   * Adapter for the configured backend, resolved once from `config.manager`.
   */
  adapter: PackageManagerAdapter;
}

/**
 * Global options accepted by every command.
 */
export type ExecutionOptions = {
  manager?: string;
  catalog?: string;
  dialog?: string;
  yes?: boolean;
};
