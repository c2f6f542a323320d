type Viewport = {
  width: number;
  height: number;
};

/**
 * What the browser presents to the target. Applied at launch and again on
 * every rotation.
 */
type ContextIdentity = {
  userAgent: string;
  platform: string;
  acceptLanguage: string;
  locale: string;
  timezoneId: string;
  viewport: Viewport;
  extraHTTPHeaders: Record<string, string>;
};

type ProxySettings = {
  server: string;
  username?: string;
  password?: string;
};

type BrowserCookie = {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Seconds since epoch; -1 for session cookies. */
  expires: number;
  secure: boolean;
  httpOnly: boolean;
};

type NavigationResult = {
  status?: number;
  finalUrl: string;
};

type LaunchRequest = {
  headless: boolean;
  executablePath?: string;
  args: string[];
  ignoreDefaultArgs: string[];
  proxy?: ProxySettings;
  identity: ContextIdentity;
  timeoutMs: number;
};

/**
 * The narrow browser interface the session engine drives. One surface owns one
 * browser, one context and one page.
 */
interface BrowserSurface {
  readonly isConnected: boolean;
  goto(url: string, timeoutMs: number): Promise<NavigationResult>;
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
  title(): Promise<string>;
  evaluate(script: string): Promise<unknown>;
  addInitScript(script: string): Promise<void>;
  moveMouse(x: number, y: number, steps: number): Promise<void>;
  applyIdentity(identity: ContextIdentity): Promise<void>;
  cookies(): Promise<BrowserCookie[]>;
  close(): Promise<void>;
}

export type {
  BrowserCookie,
  BrowserSurface,
  ContextIdentity,
  LaunchRequest,
  NavigationResult,
  ProxySettings,
  Viewport,
};
