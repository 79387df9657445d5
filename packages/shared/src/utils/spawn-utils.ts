import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
  /**
   * True when the process was killed because `timeoutMs` elapsed
   */
  timedOut: boolean;
}

/**
 * Extended spawn options with output capture and timeout control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Kill the process with SIGKILL after this many milliseconds
   */
  timeoutMs?: number;
}

/**
 * Execute a command in a child process and collect its output.
 *
 * Used for CPU-heavy work (page rasterization) so it runs outside the event
 * loop that schedules pipeline runs.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('magick', ['-version'], { timeoutMs: 5000 });
 * if (result.code !== 0) throw new Error(result.stderr);
 * ```
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
            proc.kill('SIGKILL');
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

    proc.on('close', (code) => {
      clearTimeout(timer);
      resolve({ stdout, stderr, code: code ?? (timedOut ? 137 : 0), timedOut });
    });

    proc.on('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
  });
}
