import type { ManagerKind, PackageId } from '../../types/index.js';
import type { CapturedOutput, CommandInvocation } from '../ports/command-runner.js';
import { BasePackageManager, outputLines } from './base-package-manager.js';

const REMOVAL_LINE = /^Remv\s+(\S+)/;

/**
 * APT backend for Debian and Ubuntu.
 */
export class AptGetPackageManager extends BasePackageManager {
  readonly kind: ManagerKind = { kind: 'apt-get' };

  protected installInvocation(ids: readonly PackageId[]): CommandInvocation {
    return this.aptGet(['install', ...this.yesFlag(), ...ids]);
  }

  protected removeInvocation(ids: readonly PackageId[]): CommandInvocation {
    return this.aptGet(['remove', ...this.yesFlag(), ...ids]);
  }

  protected searchInvocation(query: string): CommandInvocation {
    return { command: 'apt-cache', args: ['search', query], privileged: false };
  }

  protected syncInvocation(): CommandInvocation {
    return this.aptGet(['update']);
  }

  protected upgradeInvocation(): CommandInvocation {
    return this.aptGet(['upgrade', ...this.yesFlag()]);
  }

  protected orphanQueryInvocation(): CommandInvocation {
    return { command: 'apt-get', args: ['--simulate', 'autoremove'], privileged: false };
  }

  // A simulated autoremove prints one "Remv <name> [<version>]" line per orphan.
  protected parseOrphans(output: CapturedOutput, invocation: CommandInvocation): PackageId[] {
    if (output.exitCode !== 0) {
      throw this.failed(invocation, output);
    }
    const orphans: PackageId[] = [];
    for (const line of outputLines(output.stdout)) {
      const match = REMOVAL_LINE.exec(line);
      if (match) {
        orphans.push(match[1]);
      }
    }
    return orphans;
  }

  private aptGet(args: string[]): CommandInvocation {
    return { command: 'apt-get', args, privileged: true };
  }

  private yesFlag(): string[] {
    return this.options.assumeYes ? ['-y'] : [];
  }
}
