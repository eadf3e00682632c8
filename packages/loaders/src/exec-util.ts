import { execFile as cpExecFile } from 'node:child_process';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** True when the process was killed for exceeding its timeout. */
  timedOut: boolean;
}

/**
 * Promise wrapper for child_process.execFile with timeout support.
 *
 * On success the exit code is 0. On failure (non-zero exit, signal, or
 * timeout) the promise still resolves with whatever stdout/stderr was
 * captured so callers can inspect output without catching.
 */
export function execFile(
  command: string,
  args: string[],
  options?: { timeout?: number },
): Promise<ExecResult> {
  return new Promise((resolve) => {
    cpExecFile(
      command,
      args,
      {
        timeout: options?.timeout,
        maxBuffer: 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (error) {
          // `code` is the exit status for a non-zero exit and a string
          // (e.g. ENOENT) when the binary could not be spawned.
          const exitCode = typeof error.code === 'number' ? error.code : 1;
          resolve({
            stdout: String(stdout),
            stderr: String(stderr) || error.message,
            exitCode,
            timedOut: error.killed === true && error.signal === 'SIGTERM',
          });
          return;
        }
        resolve({ stdout: String(stdout), stderr: String(stderr), exitCode: 0, timedOut: false });
      },
    );
  });
}
