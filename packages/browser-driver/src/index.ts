export { ChromiumLaunchError, launchBrowser } from './internals/browser-launcher.js';
export {
  CHROME_PATH_ENV,
  CHROMIUM_BINARY_CANDIDATES,
  findChromiumBinary,
} from './internals/chromium-binary.js';
export { IdentityApplyError, PlaywrightSurface } from './internals/playwright-surface.js';
export type {
  BrowserCookie,
  BrowserSurface,
  ContextIdentity,
  LaunchRequest,
  NavigationResult,
  ProxySettings,
  Viewport,
} from './internals/types.js';
