import { existsSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import type { BrowserCookie } from '@tubeveil/browser-driver';
import type { CookieFile } from './cookie-jar.js';
import { DownloadOrchestrator, type DownloadRequest } from './download-orchestrator.js';
import { CommandNotFoundError, type ProcessResult, type ProcessRunner } from './process-runner.js';

const request: DownloadRequest = {
  url: 'https://www.youtube.com/watch?v=abcdefghijk',
  outputPath: '/tmp/out/%(title)s.%(ext)s',
  format: 'mp3',
  quality: '192',
};

const cookie = (name: string, domain: string): BrowserCookie => ({
  name,
  value: 'test-value',
  domain,
  path: '/',
  expires: -1,
  secure: true,
  httpOnly: true,
});

const succeed = (overrides: Partial<ProcessResult> = {}): ProcessRunner =>
  vi.fn(async () => ({ exitCode: 0, stdout: '', stderr: '', timedOut: false, ...overrides }));

function fakeCookieWriter() {
  const dispose = vi.fn(async () => undefined);
  const written: BrowserCookie[][] = [];
  const writer = vi.fn(async (cookies: readonly BrowserCookie[]): Promise<CookieFile> => {
    written.push([...cookies]);
    return { path: '/tmp/cookies.txt', dispose };
  });
  return { writer, dispose, written };
}

describe('DownloadOrchestrator', () => {
  const options = { binaryPath: 'yt-dlp', timeoutMs: 300000 };

  it('builds the audio argument template', () => {
    const orchestrator = new DownloadOrchestrator(options, succeed());

    expect(orchestrator.buildArguments(request, '/tmp/cookies.txt')).toEqual([
      '--cookies',
      '/tmp/cookies.txt',
      '--no-playlist',
      '--format',
      'bestaudio',
      '--extract-audio',
      '--audio-format',
      'mp3',
      '--audio-quality',
      '192K',
      '--embed-metadata',
      '--add-metadata',
      '--user-agent',
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      '--referer',
      'https://www.youtube.com/',
      '--sleep-interval',
      '1',
      '--max-sleep-interval',
      '3',
      '-o',
      '/tmp/out/%(title)s.%(ext)s',
      'https://www.youtube.com/watch?v=abcdefghijk',
    ]);
  });

  it('caps the video height for mp4', () => {
    const orchestrator = new DownloadOrchestrator(options, succeed());

    const args = orchestrator.buildArguments({ ...request, format: 'mp4', quality: '720p' }, '/tmp/c.txt');

    expect(args.slice(3, 7)).toEqual([
      '--format',
      'bestvideo[height<=720]+bestaudio/best[height<=720]',
      '--merge-output-format',
      'mp4',
    ]);
  });

  it('exports only cookies of the video and account domains', async () => {
    const { writer, written } = fakeCookieWriter();
    const orchestrator = new DownloadOrchestrator(options, succeed(), writer);

    await orchestrator.exportCookies([
      cookie('YSC', '.youtube.com'),
      cookie('SID', 'accounts.google.com'),
      cookie('tracker', '.example.com'),
    ]);

    expect(written[0]?.map(c => c.name)).toEqual(['YSC', 'SID']);
  });

  it('reports success and removes the cookie file', async () => {
    const runner = succeed();
    const { writer, dispose } = fakeCookieWriter();
    const orchestrator = new DownloadOrchestrator(options, runner, writer);

    const outcome = await orchestrator.download(request, [cookie('YSC', '.youtube.com')]);

    expect(outcome).toEqual({ ok: true, outputPath: '/tmp/out/%(title)s.%(ext)s' });
    expect(runner).toHaveBeenCalledWith('yt-dlp', expect.arrayContaining(['--cookies', '/tmp/cookies.txt']), {
      timeoutMs: 300000,
    });
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('reports a non-zero exit with the downloader output', async () => {
    const { writer, dispose } = fakeCookieWriter();
    const orchestrator = new DownloadOrchestrator(
      options,
      succeed({ exitCode: 1, stderr: 'ERROR: Sign in to confirm your age\n' }),
      writer,
    );

    await expect(orchestrator.download(request, [])).resolves.toEqual({
      ok: false,
      code: 'download-failed',
      message: 'Download failed: ERROR: Sign in to confirm your age',
    });
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('reports a timeout', async () => {
    const { writer } = fakeCookieWriter();
    const orchestrator = new DownloadOrchestrator(options, succeed({ exitCode: 1, timedOut: true }), writer);

    await expect(orchestrator.download(request, [])).resolves.toEqual({
      ok: false,
      code: 'download-timeout',
      message: 'Download timeout (300 seconds)',
    });
  });

  it('reports a missing downloader and still removes the cookie file', async () => {
    const runner: ProcessRunner = vi.fn(async () => {
      throw new CommandNotFoundError('yt-dlp');
    });
    const { writer, dispose } = fakeCookieWriter();
    const orchestrator = new DownloadOrchestrator(options, runner, writer);

    await expect(orchestrator.download(request, [])).resolves.toEqual({
      ok: false,
      code: 'downloader-missing',
      message: 'yt-dlp not found',
    });
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('reports a cookie export failure without running the downloader', async () => {
    const runner = succeed();
    const writer = vi.fn(async (): Promise<CookieFile> => {
      throw new Error('disk full');
    });
    const orchestrator = new DownloadOrchestrator(options, runner, writer);

    await expect(orchestrator.download(request, [])).resolves.toEqual({
      ok: false,
      code: 'cookie-export-failed',
      message: 'Failed to create cookie file: disk full',
    });
    expect(runner).not.toHaveBeenCalled();
  });
});

describe('DownloadOrchestrator cookie file lifetime', () => {
  const outcomes: [string, ProcessRunner][] = [
    ['success', succeed()],
    ['failure', succeed({ exitCode: 1, stderr: 'ERROR: boom' })],
    ['timeout', succeed({ exitCode: 1, timedOut: true })],
    [
      'missing tool',
      vi.fn(async () => {
        throw new CommandNotFoundError('yt-dlp');
      }),
    ],
  ];

  it.each(outcomes)('leaves no cookie file behind after %s', async (_label, runner) => {
    const seen: string[] = [];
    const recording: ProcessRunner = async (command, args, runOptions) => {
      const path = args[args.indexOf('--cookies') + 1];
      if (path) {
        seen.push(path);
        expect(existsSync(path)).toBe(true);
      }
      return runner(command, args, runOptions);
    };
    const orchestrator = new DownloadOrchestrator({ binaryPath: 'yt-dlp', timeoutMs: 1000 }, recording);

    await orchestrator.download(request, [cookie('YSC', '.youtube.com')]);

    expect(seen).toHaveLength(1);
    expect(existsSync(seen[0] ?? '')).toBe(false);
  });
});
