import type { BrowserCookie } from '@tubeveil/browser-driver';
import { createLogger } from '@tubeveil/logger';
import { errorMessage } from '../utils/errors.js';
import { domainMatches } from '../utils/url.js';
import { writeCookieFile, type CookieFile } from './cookie-jar.js';
import { CommandNotFoundError, runProcess, type ProcessRunner } from './process-runner.js';

const logger = createLogger('DownloadOrchestrator');

const DOWNLOADER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const DOWNLOADER_REFERER = 'https://www.youtube.com/';

/** Cookies from other sites the session visited are not handed to the downloader. */
const COOKIE_DOMAINS = ['youtube.com', 'google.com'];

type DownloadFormat = 'mp3' | 'mp4';

type DownloadRequest = {
  url: string;
  outputPath: string;
  format: DownloadFormat;
  /** Bitrate in kbit/s for mp3, maximum height for mp4. */
  quality: string;
};

type DownloadFailureCode = 'cookie-export-failed' | 'downloader-missing' | 'download-timeout' | 'download-failed';

type DownloadOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; code: DownloadFailureCode; message: string };

type DownloadOrchestratorOptions = {
  binaryPath: string;
  timeoutMs: number;
};

type CookieWriter = (cookies: readonly BrowserCookie[]) => Promise<CookieFile>;

const formatArguments = (format: DownloadFormat, quality: string): string[] => {
  const value = quality.trim().replace(/[kp]$/i, '');

  if (format === 'mp3') {
    return [
      '--format',
      'bestaudio',
      '--extract-audio',
      '--audio-format',
      'mp3',
      '--audio-quality',
      `${value}K`,
      '--embed-metadata',
      '--add-metadata',
    ];
  }

  return [
    '--format',
    `bestvideo[height<=${value}]+bestaudio/best[height<=${value}]`,
    '--merge-output-format',
    'mp4',
  ];
};

/**
 * Hands a video to the external downloader, authenticated with the browser
 * session's cookies. The cookie file lives only for the duration of one call.
 */
export class DownloadOrchestrator {
  private readonly options: DownloadOrchestratorOptions;
  private readonly runner: ProcessRunner;
  private readonly writeCookies: CookieWriter;

  constructor(
    options: DownloadOrchestratorOptions,
    runner: ProcessRunner = runProcess,
    writeCookies: CookieWriter = writeCookieFile,
  ) {
    this.options = options;
    this.runner = runner;
    this.writeCookies = writeCookies;
  }

  buildArguments(request: DownloadRequest, cookieFile: string): string[] {
    return [
      '--cookies',
      cookieFile,
      '--no-playlist',
      ...formatArguments(request.format, request.quality),
      '--user-agent',
      DOWNLOADER_USER_AGENT,
      '--referer',
      DOWNLOADER_REFERER,
      '--sleep-interval',
      '1',
      '--max-sleep-interval',
      '3',
      '-o',
      request.outputPath,
      request.url,
    ];
  }

  async exportCookies(cookies: readonly BrowserCookie[]): Promise<CookieFile> {
    const relevant = cookies.filter(cookie =>
      COOKIE_DOMAINS.some(domain => domainMatches(cookie.domain, domain)),
    );
    logger.debug(`Exporting ${relevant.length} of ${cookies.length} cookies`);
    return this.writeCookies(relevant);
  }

  async invokeDownloader(request: DownloadRequest, cookieFile: string): Promise<DownloadOutcome> {
    const { binaryPath, timeoutMs } = this.options;
    const args = this.buildArguments(request, cookieFile);

    logger.info('Starting download', { format: request.format, quality: request.quality });
    const startedAt = Date.now();

    try {
      const result = await this.runner(binaryPath, args, { timeoutMs });

      if (result.timedOut) {
        return {
          ok: false,
          code: 'download-timeout',
          message: `Download timeout (${Math.round(timeoutMs / 1000)} seconds)`,
        };
      }

      if (result.exitCode !== 0) {
        return { ok: false, code: 'download-failed', message: `Download failed: ${result.stderr.trim()}` };
      }

      logger.info(`Download finished in ${Date.now() - startedAt}ms`);
      return { ok: true, outputPath: request.outputPath };
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        return { ok: false, code: 'downloader-missing', message: 'yt-dlp not found' };
      }
      return { ok: false, code: 'download-failed', message: `Download failed: ${errorMessage(error)}` };
    }
  }

  async download(request: DownloadRequest, cookies: readonly BrowserCookie[]): Promise<DownloadOutcome> {
    let cookieFile: CookieFile;
    try {
      cookieFile = await this.exportCookies(cookies);
    } catch (error) {
      return {
        ok: false,
        code: 'cookie-export-failed',
        message: `Failed to create cookie file: ${errorMessage(error)}`,
      };
    }

    try {
      return await this.invokeDownloader(request, cookieFile.path);
    } finally {
      await cookieFile.dispose().catch((error: unknown) => {
        logger.warn('Failed to remove cookie file:', errorMessage(error));
      });
    }
  }
}

export { DOWNLOADER_REFERER, DOWNLOADER_USER_AGENT };
export type { DownloadFailureCode, DownloadFormat, DownloadOrchestratorOptions, DownloadOutcome, DownloadRequest };
