import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import { createInterface } from 'readline';
import { DependencyError } from '../utils/errors.js';

export interface ProcessResult {
  exitCode: number;
  /** stdout and stderr lines in arrival order */
  lines: string[];
}

export interface RunProcessOptions {
  onLine?: (line: string) => void;
}

/**
 * Seam between the invoker and the operating system; tests supply a fake
 */
export interface ProcessRunner {
  run(command: string, args: string[], options?: RunProcessOptions): Promise<ProcessResult>;
}

function isSpawnNotFound(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Spawns the command in the current working directory and streams its
 * output line by line. Resolves with the exit code; rejects only when the
 * process cannot be started.
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
    };

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, spawnOptions);
      const lines: string[] = [];

      const collect = (line: string) => {
        lines.push(line);
        options.onLine?.(line);
      };

      if (child.stdout) {
        createInterface({ input: child.stdout }).on('line', collect);
      }
      if (child.stderr) {
        createInterface({ input: child.stderr }).on('line', collect);
      }

      child.on('error', (error) => {
        if (isSpawnNotFound(error)) {
          reject(DependencyError.fromSpawnFailure(command, error.message));
        } else {
          reject(error);
        }
      });

      child.on('close', (code, signal) => {
        resolve({ exitCode: code ?? (signal ? 128 : 1), lines });
      });
    });
  }
}
