import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:child_process', () => ({
  execFile: vi.fn(),
}));

import { execFile } from 'node:child_process';
import { CommandNotFoundError, runProcess } from './process-runner.js';

const execFileMock = execFile as unknown as ReturnType<typeof vi.fn>;

type Callback = (error: Error | null, stdout: string, stderr: string) => void;

function respondWith(error: Error | null, stdout = '', stderr = ''): void {
  execFileMock.mockImplementation(
    (_command: string, _args: string[], _options: unknown, callback: Callback) => {
      callback(error, stdout, stderr);
    },
  );
}

const processError = (message: string, fields: Record<string, unknown>): Error =>
  Object.assign(new Error(message), fields);

describe('runProcess', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('resolves with exit code 0 on success', async () => {
    respondWith(null, 'done', '');

    await expect(runProcess('yt-dlp', ['--version'], { timeoutMs: 1000 })).resolves.toEqual({
      exitCode: 0,
      stdout: 'done',
      stderr: '',
      timedOut: false,
    });

    const call = execFileMock.mock.calls[0];
    expect(call?.[0]).toBe('yt-dlp');
    expect(call?.[1]).toEqual(['--version']);
    expect(call?.[2]).toMatchObject({ timeout: 1000 });
  });

  it('resolves with the exit code when the command fails', async () => {
    respondWith(processError('Command failed', { code: 2, killed: false }), '', 'ERROR: Video unavailable');

    await expect(runProcess('yt-dlp', [], { timeoutMs: 1000 })).resolves.toEqual({
      exitCode: 2,
      stdout: '',
      stderr: 'ERROR: Video unavailable',
      timedOut: false,
    });
  });

  it('flags a killed process as timed out', async () => {
    respondWith(processError('Command failed', { code: null, killed: true, signal: 'SIGTERM' }));

    const result = await runProcess('yt-dlp', [], { timeoutMs: 10 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('Command failed');
  });

  it('rejects when the executable is missing', async () => {
    respondWith(processError('spawn yt-dlp ENOENT', { code: 'ENOENT' }));

    await expect(runProcess('yt-dlp', [], { timeoutMs: 1000 })).rejects.toBeInstanceOf(CommandNotFoundError);
  });
});
