/**
 * In-process ProcessRunner for tests: records every call and answers from a
 * script instead of spawning Julia
 */

import type { ProcessResult, ProcessRunner, RunProcessOptions } from '../julia/process.js';

export interface RecordedCall {
  command: string;
  args: string[];
  cwd: string;
}

export type FakeResponse = ProcessResult | Error;

export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: (command: string, args: string[]) => FakeResponse) {}

  async run(command: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
    this.calls.push({ command, args, cwd: process.cwd() });

    const response = this.respond(command, args);
    if (response instanceof Error) {
      throw response;
    }

    response.lines.forEach((line) => options.onLine?.(line));
    return response;
  }
}

export function ok(...lines: string[]): ProcessResult {
  return { exitCode: 0, lines };
}

export function exit(exitCode: number, ...lines: string[]): ProcessResult {
  return { exitCode, lines };
}
