import { execFile } from 'node:child_process';

type ProcessResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

type ProcessOptions = {
  timeoutMs: number;
};

type ProcessRunner = (command: string, args: readonly string[], options: ProcessOptions) => Promise<ProcessResult>;

export class CommandNotFoundError extends Error {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    super(`${command} not found`, options);
    this.name = 'CommandNotFoundError';
    this.command = command;
  }
}

const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

/**
 * Runs a command to completion, killing it once the timeout elapses. A
 * non-zero exit resolves; only a missing executable rejects.
 */
export const runProcess: ProcessRunner = (command, args, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        if (error.code === 'ENOENT') {
          reject(new CommandNotFoundError(command, { cause: error }));
          return;
        }

        resolve({
          exitCode: typeof error.code === 'number' ? error.code : 1,
          stdout,
          stderr: stderr || error.message,
          timedOut: error.killed === true,
        });
      },
    );
  });

export type { ProcessOptions, ProcessResult, ProcessRunner };
