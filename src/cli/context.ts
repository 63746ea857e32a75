/**
 * CLI Context Factory
 *
 * Builds the ExecutionContext once per process: configuration, output port,
 * command runner and the package-manager adapter resolved from the
 * configuration. The backend is never re-resolved afterwards.
 */

import type { Command } from 'commander';

import type { ExecutionContext, ExecutionOptions, PkgdeckConfig } from '../types/index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { CommandRunner } from '../core/ports/command-runner.js';
import type { DialogProvider } from '../core/ports/dialog.js';
import { loadConfig } from '../core/config.js';
import { createManagerRegistry } from '../core/package-managers/registry.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackDialog, detectInteractive } from './clack-dialog-adapter.js';
import { createProgramDialog } from './program-dialog-adapter.js';
import { createExecCommandRunner } from './exec-command-runner.js';
import { createColorHighlighter } from './color-highlighter.js';
import { UnsupportedManagerError } from '../utils/errors.js';

let cachedContext: Promise<ExecutionContext> | undefined;

function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

async function buildContext(options: ExecutionOptions): Promise<ExecutionContext> {
  const output: OutputPort = detectInteractive() ? createClackOutput() : createPlainOutput();

  const config = await loadConfig({
    flags: options,
    env: process.env,
    isRoot: isRoot(),
    onWarning: message => output.warn(message)
  });

  const runner = createExecCommandRunner(config.privilegeCommand);
  const registry = createManagerRegistry({
    runner,
    assumeYes: config.assumeYes,
    highlighter: createColorHighlighter(),
    warn: message => output.warn(message)
  });

  return {
    config,
    output,
    runner,
    adapter: registry.adapterFor(config.manager)
  };
}

/**
 * Create (once) the ExecutionContext for this process.
 */
export function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  cachedContext ??= buildContext(options);
  return cachedContext;
}

/**
 * Pick the dialog provider named by the configuration.
 */
export function createDialogProvider(config: PkgdeckConfig, runner: CommandRunner): DialogProvider {
  return config.dialog === 'clack'
    ? createClackDialog()
    : createProgramDialog(config.dialog, runner);
}

/**
 * Warn and report false when the configured backend is not supported, so
 * commands can return before attempting any operation.
 */
export function ensureSupportedManager(ctx: ExecutionContext): boolean {
  if (ctx.config.manager.kind !== 'unsupported') {
    return true;
  }
  ctx.output.warn(new UnsupportedManagerError(ctx.config.manager.raw).message);
  process.exitCode = 1;
  return false;
}

/**
 * Global options of the root program, as seen from a subcommand.
 */
export function programOptions(command: Command): ExecutionOptions {
  return command.parent?.opts<ExecutionOptions>() ?? {};
}
