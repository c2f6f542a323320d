import type { BrowserFamily, Platform, UserAgentEntry } from './types.js';

const CHROMIUM_FAMILIES: ReadonlySet<BrowserFamily> = new Set(['chrome', 'edge']);

const DOCUMENT_ACCEPT: Record<BrowserFamily, string> = {
  chrome:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
  edge: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
  firefox: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  safari: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
};

/** `navigator.platform` values that go with each platform. */
const NAVIGATOR_PLATFORM: Record<Platform, string> = {
  Windows: 'Win32',
  macOS: 'MacIntel',
  Linux: 'Linux x86_64',
  Android: 'Linux armv8l',
  iOS: 'iPhone',
};

/**
 * Headers the browser computes per request. They stay on the identity record
 * but are never forced onto the live context.
 */
const BROWSER_MANAGED_HEADERS = [
  'user-agent',
  'accept',
  'accept-encoding',
  'connection',
  'host',
  'upgrade-insecure-requests',
];

const isChromiumFamily = (family: BrowserFamily): boolean => CHROMIUM_FAMILIES.has(family);

const majorVersion = (agent: UserAgentEntry): string | undefined => {
  const pattern = agent.family === 'edge' ? /Edg\/(\d+)/ : /Chrome\/(\d+)/;
  return pattern.exec(agent.userAgent)?.[1];
};

const brandList = (agent: UserAgentEntry, version: string): string => {
  const vendor = agent.family === 'edge' ? 'Microsoft Edge' : 'Google Chrome';
  return `"Not_A Brand";v="8", "Chromium";v="${version}", "${vendor}";v="${version}"`;
};

/**
 * Request headers matching the agent's browser family. Chromium-family agents
 * carry client hints whose brand version equals the agent's major version;
 * Firefox and Safari carry neither client hints nor `Sec-Fetch-*`.
 */
function buildHeaders(
  agent: UserAgentEntry,
  acceptLanguage: string,
  doNotTrack: boolean,
): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': agent.userAgent,
    Accept: DOCUMENT_ACCEPT[agent.family],
    'Accept-Language': acceptLanguage,
    'Accept-Encoding': 'gzip, deflate, br',
    Connection: 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  };

  if (doNotTrack) {
    headers['DNT'] = '1';
  }

  if (isChromiumFamily(agent.family)) {
    const version = majorVersion(agent) ?? '120';
    headers['sec-ch-ua'] = brandList(agent, version);
    headers['sec-ch-ua-mobile'] = agent.mobile ? '?1' : '?0';
    headers['sec-ch-ua-platform'] = `"${agent.platform}"`;
    headers['Sec-Fetch-Dest'] = 'document';
    headers['Sec-Fetch-Mode'] = 'navigate';
    headers['Sec-Fetch-Site'] = 'none';
    headers['Sec-Fetch-User'] = '?1';
  }

  return headers;
}

/** Drops the headers the browser must compute itself, plus every `Sec-Fetch-*`. */
function contextHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(([name]) => {
      const lower = name.toLowerCase();
      return !BROWSER_MANAGED_HEADERS.includes(lower) && !lower.startsWith('sec-fetch-');
    }),
  );
}

export { buildHeaders, contextHeaders, isChromiumFamily, NAVIGATOR_PLATFORM };
