import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Run a command to completion and collect its output.
 *
 * Resolves once the process closes, whatever its exit code; rejects only when
 * the process cannot be started (e.g. the binary is not installed).
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/input.pdf']);
 * if (result.code !== 0) {
 *   throw new Error(result.stderr);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, options);

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, code: code ?? 0 });
    });

    proc.on('error', reject);
  });
}
