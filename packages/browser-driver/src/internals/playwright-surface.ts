import type { Browser, BrowserContext, CDPSession, Page } from 'playwright-core';
import { createLogger } from '@tubeveil/logger';
import type {
  BrowserCookie,
  BrowserSurface,
  ContextIdentity,
  NavigationResult,
} from './types.js';

const logger = createLogger('PlaywrightSurface');

export class IdentityApplyError extends Error {
  readonly failedSteps: string[];

  constructor(failedSteps: string[]) {
    super(`Identity could not be fully applied: ${failedSteps.join(', ')}`);
    this.name = 'IdentityApplyError';
    this.failedSteps = failedSteps;
  }
}

/**
 * BrowserSurface over one playwright-core browser, context and page.
 *
 * Identity fields that playwright fixes at context creation (user agent,
 * locale, timezone) are driven through a CDP session instead so they can
 * change while the page stays open.
 */
export class PlaywrightSurface implements BrowserSurface {
  private readonly browser: Browser;
  private readonly context: BrowserContext;
  private readonly page: Page;
  private readonly cdp: CDPSession;
  private closed = false;

  constructor(browser: Browser, context: BrowserContext, page: Page, cdp: CDPSession) {
    this.browser = browser;
    this.context = context;
    this.page = page;
    this.cdp = cdp;
  }

  get isConnected(): boolean {
    return !this.closed && this.browser.isConnected();
  }

  async goto(url: string, timeoutMs: number): Promise<NavigationResult> {
    const response = await this.page.goto(url, {
      timeout: timeoutMs,
      waitUntil: 'domcontentloaded',
    });
    return { status: response?.status(), finalUrl: this.page.url() };
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'attached' });
      return true;
    } catch (error) {
      logger.debug(`Selector "${selector}" not attached within ${timeoutMs}ms:`, error);
      return false;
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  evaluate(script: string): Promise<unknown> {
    return this.page.evaluate<unknown>(script);
  }

  addInitScript(script: string): Promise<void> {
    return this.context.addInitScript(script);
  }

  moveMouse(x: number, y: number, steps: number): Promise<void> {
    return this.page.mouse.move(x, y, { steps });
  }

  /**
   * Applies every identity field, continuing past individual failures and
   * reporting them together.
   */
  async applyIdentity(identity: ContextIdentity): Promise<void> {
    const steps: Array<[string, () => Promise<unknown>]> = [
      [
        'user-agent',
        () =>
          this.cdp.send('Network.setUserAgentOverride', {
            userAgent: identity.userAgent,
            acceptLanguage: identity.acceptLanguage,
            platform: identity.platform,
          }),
      ],
      ['locale', () => this.cdp.send('Emulation.setLocaleOverride', { locale: identity.locale })],
      [
        'timezone',
        () => this.cdp.send('Emulation.setTimezoneOverride', { timezoneId: identity.timezoneId }),
      ],
      ['viewport', () => this.page.setViewportSize(identity.viewport)],
      ['headers', () => this.context.setExtraHTTPHeaders(identity.extraHTTPHeaders)],
    ];

    const failed: string[] = [];
    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        logger.warn(`Identity step "${name}" failed:`, error);
        failed.push(name);
      }
    }

    if (failed.length > 0) {
      throw new IdentityApplyError(failed);
    }
  }

  async cookies(): Promise<BrowserCookie[]> {
    return (await this.context.cookies()).map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      secure: cookie.secure,
      httpOnly: cookie.httpOnly,
    }));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.context.close();
    } catch (error) {
      logger.warn('Context close failed:', error);
    }
    await this.browser.close();
  }
}
