import { existsSync } from 'node:fs';

export const CHROME_PATH_ENV = 'TUBEVEIL_CHROME_PATH';

/** Probe order after the environment override. */
export const CHROMIUM_BINARY_CANDIDATES: readonly string[] = [
  '/usr/bin/chromium',
  '/usr/bin/chromium-browser',
  '/usr/bin/google-chrome',
  '/usr/bin/google-chrome-stable',
  '/snap/bin/chromium',
  '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
  '/Applications/Chromium.app/Contents/MacOS/Chromium',
  'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
  'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
];

type BinaryProbe = {
  override?: string;
  candidates?: readonly string[];
  exists?: (path: string) => boolean;
};

/**
 * Returns the first Chromium executable found, the explicit override first.
 * `undefined` means no binary was found and the launcher has nothing to point
 * playwright-core at.
 */
export function findChromiumBinary({
  override,
  candidates = CHROMIUM_BINARY_CANDIDATES,
  exists = existsSync,
}: BinaryProbe = {}): string | undefined {
  const ordered = override ? [override, ...candidates] : candidates;
  return ordered.find((candidate) => exists(candidate));
}
