/**
 * In-process stand-ins for the ports: no processes, no terminal.
 */

import type { CapturedOutput, CommandInvocation, CommandRunner } from '../src/core/ports/command-runner.js';
import type {
  DialogOutcome,
  DialogProvider,
  DialogRequest,
  ResultChannel,
  ResultChannelFactory
} from '../src/core/ports/dialog.js';
import type { OutputPort } from '../src/core/ports/output.js';
import type { PkgdeckConfig } from '../src/types/index.js';
import { resolveManagerKind } from '../src/core/package-managers/registry.js';

export class RecordingRunner implements CommandRunner {
  readonly calls: Array<{ method: 'run' | 'capture' | 'lines'; invocation: CommandInvocation }> = [];
  captureResult: CapturedOutput = { exitCode: 0, stdout: '', stderr: '' };
  searchLines: string[] = [];
  /** Thrown by lines() after the last search line. */
  linesFailure: Error | null = null;
  /** Commands (by first argument) whose run() should fail. */
  failOn = new Map<string, Error>();

  async run(invocation: CommandInvocation): Promise<void> {
    this.calls.push({ method: 'run', invocation });
    const failure = this.failOn.get(invocation.args.join(' '));
    if (failure) {
      throw failure;
    }
  }

  async capture(invocation: CommandInvocation): Promise<CapturedOutput> {
    this.calls.push({ method: 'capture', invocation });
    return this.captureResult;
  }

  async *lines(invocation: CommandInvocation): AsyncGenerator<string> {
    this.calls.push({ method: 'lines', invocation });
    for (const line of this.searchLines) {
      yield line;
    }
    if (this.linesFailure) {
      throw this.linesFailure;
    }
  }
}

export type ScriptedAnswer =
  | { outcome: DialogOutcome; raw?: string }
  | { throws: Error };

/**
 * Dialog that replays scripted answers and records every request.
 */
export class ScriptedDialog implements DialogProvider {
  readonly name = 'scripted';
  readonly requests: DialogRequest[] = [];
  readonly channelLocations: string[] = [];

  constructor(
    private readonly answers: ScriptedAnswer[],
    private readonly available = true
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async show(request: DialogRequest, channel: ResultChannel): Promise<DialogOutcome> {
    this.requests.push(request);
    this.channelLocations.push(channel.location);
    const answer = this.answers.shift();
    if (!answer) {
      throw new Error(`No scripted answer for dialog '${request.title}'`);
    }
    if ('throws' in answer) {
      throw answer.throws;
    }
    if (answer.raw !== undefined) {
      await channel.write(answer.raw);
    }
    return answer.outcome;
  }
}

export class MemoryChannelFactory implements ResultChannelFactory {
  private readonly live = new Map<string, string>();
  private counter = 0;
  readonly readCounts = new Map<string, number>();
  maxOpen = 0;
  /** When set, release() throws this instead of releasing. */
  releaseFailure: Error | null = null;

  get openCount(): number {
    return this.live.size;
  }

  async open(): Promise<ResultChannel> {
    const location = `memory:${++this.counter}`;
    this.live.set(location, '');
    this.maxOpen = Math.max(this.maxOpen, this.live.size);
    const live = this.live;
    const readCounts = this.readCounts;
    const releaseFailure = (): Error | null => this.releaseFailure;

    return {
      location,
      async write(raw: string): Promise<void> {
        live.set(location, raw);
      },
      async read(): Promise<string> {
        readCounts.set(location, (readCounts.get(location) ?? 0) + 1);
        return live.get(location) ?? '';
      },
      async release(): Promise<void> {
        const failure = releaseFailure();
        if (failure) {
          throw failure;
        }
        live.delete(location);
      }
    };
  }

  async exists(location: string): Promise<boolean> {
    return this.live.has(location);
  }
}

export class RecordingOutput implements OutputPort {
  readonly lines: string[] = [];

  info(message: string): void { this.lines.push(`info: ${message}`); }
  step(message: string): void { this.lines.push(`step: ${message}`); }
  message(message: string): void { this.lines.push(`message: ${message}`); }
  success(message: string): void { this.lines.push(`success: ${message}`); }
  error(message: string): void { this.lines.push(`error: ${message}`); }
  warn(message: string): void { this.lines.push(`warn: ${message}`); }
}

export function testConfig(managerValue: string): PkgdeckConfig {
  return {
    manager: resolveManagerKind(managerValue),
    catalogPath: '/nonexistent/catalog.yml',
    dialog: 'clack',
    assumeYes: false,
    privilegeCommand: 'sudo'
  };
}
