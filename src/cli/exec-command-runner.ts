/**
 * child_process implementation of the CommandRunner port.
 *
 * Privileged invocations are prefixed with the configured escalation
 * command (sudo by default, nothing when already root).
 */

import { spawn, type ChildProcess } from 'child_process';
import { createInterface } from 'readline';

import type { CapturedOutput, CommandInvocation, CommandRunner } from '../core/ports/command-runner.js';
import { formatInvocation } from '../core/ports/command-runner.js';
import { CommandFailedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type ExitStatus = { code: number | null } | { error: Error };

export interface SpawnTarget {
  file: string;
  args: string[];
}

export function toSpawnTarget(invocation: CommandInvocation, privilegeCommand: string): SpawnTarget {
  if (invocation.privileged && privilegeCommand !== '') {
    return { file: privilegeCommand, args: [invocation.command, ...invocation.args] };
  }
  return { file: invocation.command, args: invocation.args };
}

function waitForExit(child: ChildProcess): Promise<ExitStatus> {
  return new Promise<ExitStatus>(resolve => {
    child.once('error', error => resolve({ error }));
    child.once('close', code => resolve({ code }));
  });
}

export function createExecCommandRunner(privilegeCommand: string): CommandRunner {
  const start = (invocation: CommandInvocation, stdio: 'inherit' | 'pipe' | 'lines'): ChildProcess => {
    const target = toSpawnTarget(invocation, privilegeCommand);
    logger.debug(`spawn: ${[target.file, ...target.args].join(' ')}`);
    switch (stdio) {
      case 'inherit':
        return spawn(target.file, target.args, { stdio: 'inherit' });
      case 'pipe':
        return spawn(target.file, target.args, { stdio: ['ignore', 'pipe', 'pipe'] });
      case 'lines':
        return spawn(target.file, target.args, { stdio: ['ignore', 'pipe', 'inherit'] });
    }
  };

  return {
    async run(invocation: CommandInvocation): Promise<void> {
      const status = await waitForExit(start(invocation, 'inherit'));
      if ('error' in status) {
        throw status.error;
      }
      if (status.code !== 0) {
        throw new CommandFailedError(formatInvocation(invocation), status.code);
      }
    },

    async capture(invocation: CommandInvocation): Promise<CapturedOutput> {
      const child = start(invocation, 'pipe');
      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf8').on('data', (chunk: string) => { stdout += chunk; });
      child.stderr?.setEncoding('utf8').on('data', (chunk: string) => { stderr += chunk; });

      const status = await waitForExit(child);
      if ('error' in status) {
        throw status.error;
      }
      return { exitCode: status.code, stdout, stderr };
    },

    async *lines(invocation: CommandInvocation): AsyncGenerator<string> {
      const child = start(invocation, 'lines');
      const exit = waitForExit(child);
      const stdout = child.stdout;
      if (!stdout) {
        throw new Error(`No stdout for ${formatInvocation(invocation)}`);
      }

      let finished = false;
      try {
        for await (const line of createInterface({ input: stdout, crlfDelay: Infinity })) {
          yield line;
        }
        finished = true;
      } finally {
        // Consumer stopped early
        if (!finished) {
          child.kill();
        }
      }

      const status = await exit;
      if ('error' in status) {
        throw status.error;
      }
      if (status.code !== 0) {
        throw new CommandFailedError(formatInvocation(invocation), status.code);
      }
    }
  };
}
