import type { Identity } from '../identity/types.js';

/** Chromium switches that hide automation and quiet background activity. */
const EVASION_LAUNCH_FLAGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-features=VizDisplayCompositor,TranslateUI,site-per-process,VizServiceDisplay',
  '--disable-ipc-flooding-protection',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
  '--disable-field-trial-config',
  '--disable-back-forward-cache',
  '--disable-background-timer-throttling',
  '--no-first-run',
  '--no-default-browser-check',
  '--no-pings',
  '--password-store=basic',
  '--use-mock-keychain',
  '--disable-component-extensions-with-background-pages',
  '--disable-default-apps',
  '--mute-audio',
  '--disable-background-networking',
  '--disable-sync',
  '--metrics-recording-only',
  '--disable-breakpad',
] as const;

/** Needed when Chromium runs as root inside a container without a GPU. */
const CONTAINER_LAUNCH_FLAGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-software-rasterizer',
] as const;

/** Defaults playwright passes that would announce automation. */
const IGNORED_DEFAULT_ARGS = ['--enable-automation'] as const;

type LaunchFlagOptions = {
  antiDetection: boolean;
  container: boolean;
  identity: Identity;
};

function buildLaunchArgs({ antiDetection, container, identity }: LaunchFlagOptions): string[] {
  const { width, height } = identity.viewport;
  const args: string[] = [
    ...(antiDetection ? EVASION_LAUNCH_FLAGS : []),
    ...(container ? CONTAINER_LAUNCH_FLAGS : []),
    `--lang=${identity.locale}`,
    `--window-size=${width},${height}`,
  ];

  return [...new Set(args)];
}

export { buildLaunchArgs, CONTAINER_LAUNCH_FLAGS, EVASION_LAUNCH_FLAGS, IGNORED_DEFAULT_ARGS };
export type { LaunchFlagOptions };
