type ProxyProtocol = 'http' | 'https' | 'socks5';

type ProxyEndpoint = {
  host: string;
  port: number;
  protocol: ProxyProtocol;
  username?: string;
  password?: string;
};

type ProxyRegistryConfig = {
  listUrl?: string;
  timeoutMs: number;
  maxEntries: number;
};

const DEFAULT_PROXY_REGISTRY_CONFIG: ProxyRegistryConfig = {
  timeoutMs: 5_000,
  maxEntries: 10,
};

export { DEFAULT_PROXY_REGISTRY_CONFIG };
export type { ProxyEndpoint, ProxyProtocol, ProxyRegistryConfig };
