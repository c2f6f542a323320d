import type { ProxyEndpoint, ProxyProtocol } from './types.js';

const PROTOCOLS: readonly ProxyProtocol[] = ['http', 'https', 'socks5'];

const parsePort = (value: string): number | undefined => {
  if (!/^\d{1,5}$/.test(value)) {
    return undefined;
  }
  const port = Number(value);
  return port >= 1 && port <= 65_535 ? port : undefined;
};

const isProtocol = (value: string): value is ProxyProtocol =>
  PROTOCOLS.some((protocol) => protocol === value);

/**
 * Parses a newline-delimited `host:port` list. Malformed lines are skipped;
 * at most `maxEntries` endpoints are returned.
 */
export function parseProxyList(text: string, maxEntries: number): ProxyEndpoint[] {
  const endpoints: ProxyEndpoint[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (endpoints.length >= maxEntries) {
      break;
    }

    const [host, rawPort, ...rest] = line.trim().split(':');
    if (!host || rawPort === undefined || rest.length > 0) {
      continue;
    }

    const port = parsePort(rawPort);
    if (port !== undefined) {
      endpoints.push({ host, port, protocol: 'http' });
    }
  }

  return endpoints;
}

/** Parses `protocol://[user:pass@]host:port`; `undefined` when malformed. */
export function parseProxyUrl(value: string): ProxyEndpoint | undefined {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return undefined;
  }

  const protocol = url.protocol.replace(/:$/, '');
  const port = parsePort(url.port);
  if (!isProtocol(protocol) || !url.hostname || port === undefined) {
    return undefined;
  }

  return {
    host: url.hostname,
    port,
    protocol,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
  };
}

export function formatProxyServer(endpoint: ProxyEndpoint): string {
  return `${endpoint.protocol}://${endpoint.host}:${endpoint.port}`;
}

export const endpointKey = (endpoint: ProxyEndpoint): string =>
  `${endpoint.protocol}://${endpoint.host}:${endpoint.port}`;
