/**
 * Command Runner Port
 *
 * Every external program pkgdeck starts (package managers, dialog programs,
 * `command -v` probes) goes through this interface so backends can be
 * exercised without touching the system.
 */

export interface CommandInvocation {
  command: string;
  args: string[];
  /** Run through the configured privilege escalation command (sudo). */
  privileged: boolean;
}

export interface CapturedOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run with the terminal attached (the backend may prompt the user).
   * Rejects with CommandFailedError on a non-zero exit.
   */
  run(invocation: CommandInvocation): Promise<void>;

  /**
   * Run and capture output. Never rejects on a non-zero exit; callers
   * decide what the exit code means.
   */
  capture(invocation: CommandInvocation): Promise<CapturedOutput>;

  /**
   * Stream stdout line by line. Rejects with CommandFailedError after the
   * last line if the command exits non-zero.
   */
  lines(invocation: CommandInvocation): AsyncIterable<string>;
}

export function formatInvocation(invocation: CommandInvocation): string {
  return [invocation.command, ...invocation.args].join(' ');
}
