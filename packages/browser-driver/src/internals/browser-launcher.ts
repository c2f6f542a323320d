import { chromium, type Browser, type BrowserType } from 'playwright-core';
import { createLogger } from '@tubeveil/logger';
import { IdentityApplyError, PlaywrightSurface } from './playwright-surface.js';
import type { LaunchRequest } from './types.js';

const logger = createLogger('BrowserLauncher');

export class ChromiumLaunchError extends Error {
  readonly code = 'chromium-launch-failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChromiumLaunchError';
  }
}

/**
 * Launches Chromium and opens the single page a session drives. Any failure
 * before the page exists is a ChromiumLaunchError; a partially applied
 * identity is only logged.
 */
export async function launchBrowser(
  request: LaunchRequest,
  browserType: BrowserType = chromium,
): Promise<PlaywrightSurface> {
  let browser: Browser;
  try {
    browser = await browserType.launch({
      headless: request.headless,
      executablePath: request.executablePath,
      args: request.args,
      ignoreDefaultArgs: request.ignoreDefaultArgs,
      proxy: request.proxy,
      timeout: request.timeoutMs,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ChromiumLaunchError(`Failed to launch Chromium: ${reason}`, { cause: error });
  }

  let surface: PlaywrightSurface;
  try {
    const context = await browser.newContext({
      viewport: request.identity.viewport,
      extraHTTPHeaders: request.identity.extraHTTPHeaders,
    });
    const page = await context.newPage();
    const cdp = await context.newCDPSession(page);
    surface = new PlaywrightSurface(browser, context, page, cdp);
  } catch (error) {
    await browser.close();
    const reason = error instanceof Error ? error.message : String(error);
    throw new ChromiumLaunchError(`Failed to open a browser page: ${reason}`, { cause: error });
  }

  try {
    await surface.applyIdentity(request.identity);
  } catch (error) {
    if (!(error instanceof IdentityApplyError)) {
      await surface.close();
      throw error;
    }
    logger.warn('Launched with a partially applied identity:', error.failedSteps);
  }

  logger.info(
    `Chromium launched (headless=${request.headless}, proxy=${request.proxy ? request.proxy.server : 'direct'})`,
  );
  return surface;
}
