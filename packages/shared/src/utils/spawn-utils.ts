import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

import { TimeoutError } from './timeout';

/**
 * Exit status and captured output of a child process
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Capture stdout into the result (default: true)
   */
  captureStdout?: boolean;

  /**
   * Capture stderr into the result (default: true)
   */
  captureStderr?: boolean;

  /**
   * Kill the child with SIGTERM and reject once this many milliseconds pass
   */
  timeoutMs?: number;
}

/**
 * Run an external command and collect its output.
 *
 * Used to hand a written package to the user-configured compile command.
 * Resolves on `close` whatever the exit code; callers decide what a
 * non-zero code means.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('compile-pack', ['sources', 'out'], {
 *   cwd: outputDir,
 *   timeoutMs: 60_000,
 * });
 * if (result.code !== 0) {
 *   throw new Error(result.stderr);
 * }
 * ```
 *
 * @throws {TimeoutError} when `timeoutMs` elapses before the child exits
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    timeoutMs,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            proc.kill('SIGTERM');
            reject(new TimeoutError(command, timeoutMs));
          }, timeoutMs);

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code: number | null) => {
      clearTimeout(timer);
      if (!timedOut) {
        resolve({ stdout, stderr, code: code ?? 0 });
      }
    });

    proc.on('error', (error: Error) => {
      clearTimeout(timer);
      reject(error);
    });
  });
}
