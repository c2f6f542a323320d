import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadEngineConfig, safeLoadEngineConfig } from './engine-config.js';

describe('loadEngineConfig', () => {
  it('applies defaults for every tuning value', () => {
    const config = loadEngineConfig({}, {});

    expect(config.headless).toBe(false);
    expect(config.antiDetection).toBe(false);
    expect(config.rotation).toEqual({
      requestThreshold: { min: 50, max: 100 },
      intervalSeconds: { min: 600, max: 900 },
      randomChance: 0.05,
      wakeSeconds: { min: 3, max: 8 },
      joinTimeoutMs: 5_000,
    });
    expect(config.proxy).toEqual({
      listUrl: undefined,
      staticProxies: [],
      refreshTimeoutMs: 5_000,
      maxEntries: 10,
    });
    expect(config.download).toEqual({ binaryPath: 'yt-dlp', timeoutMs: 300_000 });
  });

  it('reads environment variables', () => {
    const config = loadEngineConfig(
      {},
      {
        TUBEVEIL_CHROME_PATH: '/opt/chromium/chrome',
        TUBEVEIL_PROXY_LIST_URL: 'https://proxies.example.test/list.txt',
        TUBEVEIL_PROXIES: 'http://10.0.0.1:8080, socks5://10.0.0.2:1080',
        TUBEVEIL_YTDLP_PATH: '/usr/local/bin/yt-dlp',
        TUBEVEIL_DOWNLOAD_TIMEOUT_MS: '60000',
        TUBEVEIL_CONTAINER: 'true',
      },
    );

    expect(config.chromePath).toBe('/opt/chromium/chrome');
    expect(config.container).toBe(true);
    expect(config.proxy.listUrl).toBe('https://proxies.example.test/list.txt');
    expect(config.proxy.staticProxies).toEqual(['http://10.0.0.1:8080', 'socks5://10.0.0.2:1080']);
    expect(config.download).toEqual({ binaryPath: '/usr/local/bin/yt-dlp', timeoutMs: 60_000 });
  });

  it('prefers explicit overrides over the environment', () => {
    const config = loadEngineConfig(
      { container: false, download: { timeoutMs: 1_000 } },
      { TUBEVEIL_CONTAINER: '1', TUBEVEIL_DOWNLOAD_TIMEOUT_MS: '60000' },
    );

    expect(config.container).toBe(false);
    expect(config.download.timeoutMs).toBe(1_000);
  });

  it('turns anti-detection on for advanced evasion and continuous rotation', () => {
    expect(loadEngineConfig({ advancedEvasion: true }, {}).antiDetection).toBe(true);
    expect(loadEngineConfig({ continuousRotation: true }, {}).antiDetection).toBe(true);
  });

  it('rejects inverted ranges', () => {
    expect(() =>
      loadEngineConfig({ rotation: { wakeSeconds: { min: 9, max: 3 } } }, {}),
    ).toThrow(ZodError);
  });

  it('rejects a non-numeric download timeout', () => {
    expect(() => loadEngineConfig({}, { TUBEVEIL_DOWNLOAD_TIMEOUT_MS: 'soon' })).toThrow(ZodError);
  });
});

describe('safeLoadEngineConfig', () => {
  it('returns the same config as the throwing loader', () => {
    const env = { TUBEVEIL_PROXIES: 'http://10.0.0.5:3128' };

    expect(safeLoadEngineConfig({ advancedEvasion: true }, env)).toEqual({
      success: true,
      config: loadEngineConfig({ advancedEvasion: true }, env),
    });
  });

  it('reports the first invalid environment value instead of throwing', () => {
    expect(safeLoadEngineConfig({}, { TUBEVEIL_PROXY_LIST_URL: 'not a url' })).toEqual({
      success: false,
      error: 'Invalid configuration at proxy.listUrl: Invalid url',
    });
  });

  it('fails on a non-numeric download timeout', () => {
    const result = safeLoadEngineConfig({}, { TUBEVEIL_DOWNLOAD_TIMEOUT_MS: 'soon' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.startsWith('Invalid configuration at download.timeoutMs: ')).toBe(true);
    }
  });
});
