import { describe, it, expect, vi } from 'vitest';
import { createSeededRandom, mathRandom } from '../utils/random.js';
import { ProxyRegistry, toLaunchProxy } from './proxy-registry.js';

const listUrl = 'https://proxies.example.test/list';

function createRegistry(listUrlOverride?: string) {
  const get = vi.fn();
  const registry = new ProxyRegistry({ listUrl: listUrlOverride }, mathRandom, { get });
  return { registry, get };
}

describe('ProxyRegistry', () => {

  it('starts empty and selects a direct connection', () => {
    const registry = new ProxyRegistry();

    expect(registry.shouldRefresh()).toBe(true);
    expect(registry.select()).toBeUndefined();
    expect(registry.current()).toBeUndefined();
  });

  it('refresh() is a no-op without a list url', async () => {
    const { registry, get } = createRegistry();

    await expect(registry.refresh()).resolves.toBe(0);
    expect(get).not.toHaveBeenCalled();
  });

  it('refresh() loads endpoints with a bounded timeout', async () => {
    const { registry, get } = createRegistry(listUrl);
    get.mockResolvedValueOnce({ status: 200, data: '10.0.0.1:8080\n10.0.0.2:3128\n' });

    await expect(registry.refresh()).resolves.toBe(2);

    expect(get).toHaveBeenCalledWith(listUrl, {
      timeout: 5_000,
      responseType: 'text',
    });
    expect(registry.size).toBe(2);
    expect(registry.shouldRefresh()).toBe(false);
  });

  it('refresh() leaves the pool unchanged on network failure', async () => {
    const { registry, get } = createRegistry(listUrl);
    get.mockRejectedValueOnce(new Error('timeout of 5000ms exceeded'));
    registry.add([{ host: '10.0.0.9', port: 9000, protocol: 'http' }]);

    await expect(registry.refresh()).resolves.toBe(0);
    expect(registry.size).toBe(1);
  });

  it('refresh() ignores non-200 and non-text responses', async () => {
    const { registry, get } = createRegistry(listUrl);
    get
      .mockResolvedValueOnce({ status: 204, data: '' })
      .mockResolvedValueOnce({ status: 200, data: { proxies: [] } });

    await expect(registry.refresh()).resolves.toBe(0);
    await expect(registry.refresh()).resolves.toBe(0);
    expect(registry.size).toBe(0);
  });

  it('deduplicates endpoints and selects from the pool', () => {
    const registry = new ProxyRegistry({}, createSeededRandom(1));
    registry.add([
      { host: '10.0.0.1', port: 8080, protocol: 'http' },
      { host: '10.0.0.1', port: 8080, protocol: 'http' },
      { host: '10.0.0.2', port: 8080, protocol: 'http' },
    ]);

    expect(registry.size).toBe(2);
    const selected = registry.select();
    expect(selected?.host).toMatch(/^10\.0\.0\.[12]$/);
    expect(registry.current()).toBe(selected);
  });
});

describe('toLaunchProxy', () => {
  it('maps an endpoint to the browser proxy option', () => {
    expect(
      toLaunchProxy({ host: '10.0.0.1', port: 1080, protocol: 'socks5', username: 'u', password: 'test-secret' }),
    ).toEqual({ server: 'socks5://10.0.0.1:1080', username: 'u', password: 'test-secret' });
    expect(toLaunchProxy(undefined)).toBeUndefined();
  });
});
