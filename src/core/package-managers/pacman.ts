import type { ManagerKind, PackageId } from '../../types/index.js';
import type { CapturedOutput, CommandInvocation } from '../ports/command-runner.js';
import { BasePackageManager, outputLines } from './base-package-manager.js';

/**
 * pacman backend for Arch Linux.
 */
export class PacmanPackageManager extends BasePackageManager {
  readonly kind: ManagerKind = { kind: 'pacman' };

  protected installInvocation(ids: readonly PackageId[]): CommandInvocation {
    return this.pacman(['-S', ...this.noConfirmFlag(), ...ids]);
  }

  protected removeInvocation(ids: readonly PackageId[]): CommandInvocation {
    return this.pacman(['-Rns', ...this.noConfirmFlag(), ...ids]);
  }

  protected searchInvocation(query: string): CommandInvocation {
    return { command: 'pacman', args: ['-Ss', query], privileged: false };
  }

  protected syncInvocation(): CommandInvocation {
    return this.pacman(['-Sy']);
  }

  protected upgradeInvocation(): CommandInvocation {
    return this.pacman(['-Syu', ...this.noConfirmFlag()]);
  }

  protected orphanQueryInvocation(): CommandInvocation {
    return { command: 'pacman', args: ['-Qdtq'], privileged: false };
  }

  // -Ss exits 1 when nothing matches.
  protected searchExitIsEmpty(exitCode: number | null): boolean {
    return exitCode === 0 || exitCode === 1;
  }

  // -Qdtq exits 1 with no output when there is nothing to report.
  protected parseOrphans(output: CapturedOutput, invocation: CommandInvocation): PackageId[] {
    const lines = outputLines(output.stdout);
    if (output.exitCode === 0 || (output.exitCode === 1 && lines.length === 0)) {
      return lines;
    }
    throw this.failed(invocation, output);
  }

  private pacman(args: string[]): CommandInvocation {
    return { command: 'pacman', args, privileged: true };
  }

  private noConfirmFlag(): string[] {
    return this.options.assumeYes ? ['--noconfirm'] : [];
  }
}
