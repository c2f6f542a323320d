import { describe, it, expect } from 'vitest';
import { testIdentity } from '../testing/identity-fixture.js';
import { EVASION_PATCHES } from './patches.js';

const build = (name: string, identity = testIdentity()): string => {
  const found = EVASION_PATCHES.find(patch => patch.name === name);
  if (!found) throw new Error(`missing patch ${name}`);
  return found.build(identity);
};

describe('evasion patches', () => {
  it('catalogs every fingerprint surface once', () => {
    expect(EVASION_PATCHES.map(patch => patch.name)).toEqual([
      'webdriver-flag',
      'plugins',
      'languages',
      'permissions',
      'chrome-runtime',
      'hardware',
      'screen',
      'timezone',
      'battery',
      'connection',
      'canvas-noise',
      'webrtc-passthrough',
    ]);
  });

  it('wraps each patch in a self-invoking function', () => {
    for (const patch of EVASION_PATCHES) {
      const source = patch.build(testIdentity());
      expect(source.startsWith('(() => {\n')).toBe(true);
      expect(source.endsWith('\n})();')).toBe(true);
    }
  });

  it('reports the identity languages and navigator platform', () => {
    const source = build('languages', testIdentity({ languages: ['de-DE', 'de'], platform: 'macOS' }));

    expect(source).toContain('const languages = Object.freeze(["de-DE","de"]);');
    expect(source).toContain(
      `Object.defineProperty(Navigator.prototype, "platform", { get: () => "MacIntel", configurable: true });`,
    );
  });

  it('reports identity hardware and screen values', () => {
    const identity = testIdentity({
      deviceMemory: 4,
      hardwareConcurrency: 12,
      viewport: { width: 1366, height: 768 },
      colorDepth: 30,
    });

    const hardware = build('hardware', identity);
    expect(hardware).toContain('"deviceMemory", { get: () => 4,');
    expect(hardware).toContain('"hardwareConcurrency", { get: () => 12,');

    const screen = build('screen', identity);
    expect(screen).toContain('"width", { get: () => 1366,');
    expect(screen).toContain('"availHeight", { get: () => 728,');
    expect(screen).toContain('"colorDepth", { get: () => 30,');
  });

  it('escapes the timezone as a string literal', () => {
    expect(build('timezone', testIdentity({ timezone: 'Asia/Tokyo' }))).toContain(
      'const timeZone = "Asia/Tokyo";',
    );
  });

  it('declares a marker only where the patch guards on one', () => {
    expect(build('canvas-noise')).toContain("Symbol.for('tubeveil.evasion.canvas-noise')");
    expect(build('webdriver-flag')).not.toContain('Symbol.for');
  });

  it('binds only identity-derived patches to rotation', () => {
    expect(EVASION_PATCHES.filter(patch => patch.identityBound).map(patch => patch.name)).toEqual([
      'languages',
      'chrome-runtime',
      'hardware',
      'screen',
      'timezone',
    ]);
  });
});
