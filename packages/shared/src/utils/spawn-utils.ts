import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;

  /**
   * Exit code, -1 when the process was killed by a signal
   */
  code: number;
}

/**
 * Extended spawn options with output capture control
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
}

/**
 * A command exited with a non-zero code
 */
export class SpawnExitError extends Error {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly result: SpawnResult,
  ) {
    const detail = result.stderr.trim();
    super(
      `${command} exited with code ${result.code}${detail ? `: ${detail}` : ''}`,
    );
    this.name = 'SpawnExitError';
  }
}

/**
 * Run an external command and collect its output.
 *
 * Resolves with the exit code whatever it is; rejects only when the command
 * cannot be started (e.g. ENOENT when the tool is not installed).
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfimages', ['-v']);
 * console.log(result.stderr); // "pdfimages version 24.02.0"
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
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';

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
      resolve({ stdout, stderr, code: code ?? -1 });
    });

    proc.on('error', reject);
  });
}

/**
 * Like spawnAsync, but a non-zero exit becomes a SpawnExitError
 */
export async function spawnChecked(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const result = await spawnAsync(command, args, options);
  if (result.code !== 0) {
    throw new SpawnExitError(command, args, result);
  }
  return result;
}
