/**
 * Program Dialog Adapter
 *
 * DialogProvider backed by the `dialog` or `whiptail` binaries. Both draw on
 * the terminal and print the chosen tag(s) on stderr, which is pointed at
 * the session's result channel.
 */

import { spawn } from 'child_process';
import { open } from 'fs/promises';

import type { DialogOutcome, DialogProvider, DialogRequest, ResultChannel } from '../core/ports/dialog.js';
import type { CommandRunner } from '../core/ports/command-runner.js';
import { CommandFailedError } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export type DialogProgram = 'dialog' | 'whiptail';

// Exit statuses shared by dialog and whiptail
const EXIT_OK = 0;
const EXIT_CANCEL = 1;
const EXIT_ESC = 255;

/**
 * Build the command-line arguments for one request.
 */
export function buildDialogArgs(request: DialogRequest): string[] {
  const { height, width, listHeight } = request.geometry;
  const text = request.text ?? '';
  const args = ['--title', request.title];

  switch (request.mode) {
    case 'single':
      return [
        ...args, '--menu', text, String(height), String(width), String(listHeight),
        ...request.items.flatMap(item => [item.tag, item.label])
      ];
    case 'multi':
      return [
        ...args, '--checklist', text, String(height), String(width), String(listHeight),
        ...request.items.flatMap(item => [item.tag, item.label, item.checked ? 'on' : 'off'])
      ];
    case 'confirm':
      return [...args, '--yesno', text, String(height), String(width)];
  }
}

export function outcomeForExitCode(program: DialogProgram, exitCode: number | null): DialogOutcome {
  if (exitCode === EXIT_OK) return 'ok';
  if (exitCode === EXIT_CANCEL || exitCode === EXIT_ESC) return 'cancel';
  throw new CommandFailedError(program, exitCode);
}

export function createProgramDialog(program: DialogProgram, runner: CommandRunner): DialogProvider {
  return {
    name: program,

    async isAvailable(): Promise<boolean> {
      if (process.stdin.isTTY !== true) {
        return false;
      }
      const probe = await runner.capture({
        command: 'sh',
        args: ['-c', `command -v ${program}`],
        privileged: false
      });
      return probe.exitCode === 0 && probe.stdout.trim() !== '';
    },

    async show(request: DialogRequest, channel: ResultChannel): Promise<DialogOutcome> {
      const exitCode = await runProgram(program, buildDialogArgs(request), channel.location);
      logger.debug(`${program} exited with ${exitCode}`);

      // Its own errors also end in 255 and land in the answer file
      if (exitCode === EXIT_ESC) {
        const diagnostic = (await readTextFile(channel.location)).trim();
        if (diagnostic !== '') {
          logger.debug(`${program} output on exit ${EXIT_ESC}: ${diagnostic}`);
        }
      }
      return outcomeForExitCode(program, exitCode);
    },
  };
}

async function runProgram(program: DialogProgram, args: string[], answerPath: string): Promise<number | null> {
  const answer = await open(answerPath, 'w');
  try {
    return await new Promise<number | null>((resolve, reject) => {
      const child = spawn(program, args, { stdio: ['inherit', 'inherit', answer.fd] });
      child.once('error', reject);
      child.once('close', resolve);
    });
  } finally {
    await answer.close();
  }
}
