import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BrowserCookie } from '@tubeveil/browser-driver';

const NETSCAPE_HEADER = '# Netscape HTTP Cookie File';

type CookieFile = {
  path: string;
  dispose: () => Promise<void>;
};

const sanitize = (value: string): string => value.replace(/[\t\r\n]/g, '');

const flag = (value: boolean): string => (value ? 'TRUE' : 'FALSE');

/**
 * Netscape cookie jar text: domain, include-subdomains, path, secure, expiry,
 * name, value. Session cookies are written with expiry 0.
 */
function formatNetscapeCookies(cookies: readonly BrowserCookie[]): string {
  const lines = cookies.map(cookie =>
    [
      sanitize(cookie.domain),
      flag(cookie.domain.startsWith('.')),
      sanitize(cookie.path || '/'),
      flag(cookie.secure),
      String(cookie.expires > 0 ? Math.floor(cookie.expires) : 0),
      sanitize(cookie.name),
      sanitize(cookie.value),
    ].join('\t'),
  );

  return [NETSCAPE_HEADER, ...lines].join('\n') + '\n';
}

/** Writes the jar into its own private temp directory; `dispose` removes both. */
async function writeCookieFile(cookies: readonly BrowserCookie[]): Promise<CookieFile> {
  const directory = await mkdtemp(join(tmpdir(), 'tubeveil-cookies-'));
  const path = join(directory, 'cookies.txt');

  try {
    await writeFile(path, formatNetscapeCookies(cookies), { mode: 0o600 });
  } catch (error) {
    await rm(directory, { recursive: true, force: true });
    throw error;
  }

  return {
    path,
    dispose: () => rm(directory, { recursive: true, force: true }),
  };
}

export { formatNetscapeCookies, NETSCAPE_HEADER, writeCookieFile };
export type { CookieFile };
