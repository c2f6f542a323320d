import axios, { type AxiosInstance } from 'axios';
import type { ProxySettings } from '@tubeveil/browser-driver';
import { createLogger } from '@tubeveil/logger';
import { mathRandom, pick, type RandomSource } from '../utils/random.js';
import { endpointKey, formatProxyServer, parseProxyList } from './proxy-list.js';
import {
  DEFAULT_PROXY_REGISTRY_CONFIG,
  type ProxyEndpoint,
  type ProxyRegistryConfig,
} from './types.js';

const logger = createLogger('ProxyRegistry');

/**
 * Known egress proxies. An empty pool is a valid state meaning a direct
 * connection.
 */
export class ProxyRegistry {
  private readonly config: ProxyRegistryConfig;
  private readonly rng: RandomSource;
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly pool: Map<string, ProxyEndpoint>;
  private active: ProxyEndpoint | undefined;

  constructor(
    config?: Partial<ProxyRegistryConfig>,
    rng: RandomSource = mathRandom,
    http: Pick<AxiosInstance, 'get'> = axios,
  ) {
    this.config = { ...DEFAULT_PROXY_REGISTRY_CONFIG, ...config };
    this.rng = rng;
    this.http = http;
    this.pool = new Map();
  }

  current(): ProxyEndpoint | undefined {
    return this.active;
  }

  get size(): number {
    return this.pool.size;
  }

  shouldRefresh(): boolean {
    return this.pool.size === 0;
  }

  add(endpoints: readonly ProxyEndpoint[]): void {
    for (const endpoint of endpoints) {
      this.pool.set(endpointKey(endpoint), endpoint);
    }
  }

  /**
   * Pulls candidates from the configured list source. Never throws: any
   * failure is logged and the pool stays as it was. Resolves to the number
   * of endpoints added.
   */
  async refresh(): Promise<number> {
    const { listUrl, timeoutMs, maxEntries } = this.config;
    if (!listUrl) {
      return 0;
    }

    try {
      const response = await this.http.get<unknown>(listUrl, {
        timeout: timeoutMs,
        responseType: 'text',
      });

      if (response.status !== 200) {
        logger.warn(`Proxy list returned HTTP ${response.status}, keeping ${this.pool.size} proxies`);
        return 0;
      }

      if (typeof response.data !== 'string') {
        logger.warn('Proxy list response was not text, ignoring it');
        return 0;
      }

      const endpoints = parseProxyList(response.data, maxEntries);
      const before = this.pool.size;
      this.add(endpoints);
      logger.info(`Proxy list refreshed: ${endpoints.length} candidates, pool size ${this.pool.size}`);
      return this.pool.size - before;
    } catch (error) {
      logger.warn('Proxy list refresh failed:', error);
      return 0;
    }
  }

  /** Uniform draw from the pool; `undefined` means direct connection. */
  select(): ProxyEndpoint | undefined {
    const endpoints = [...this.pool.values()];
    this.active = endpoints.length > 0 ? pick(this.rng, endpoints) : undefined;
    return this.active;
  }
}

export function toLaunchProxy(endpoint: ProxyEndpoint | undefined): ProxySettings | undefined {
  if (!endpoint) {
    return undefined;
  }
  return {
    server: formatProxyServer(endpoint),
    username: endpoint.username,
    password: endpoint.password,
  };
}
