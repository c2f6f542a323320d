import { describe, it, expect } from 'vitest';
import { testIdentity } from '../testing/identity-fixture.js';
import { buildLaunchArgs, CONTAINER_LAUNCH_FLAGS, EVASION_LAUNCH_FLAGS } from './launch-flags.js';

describe('buildLaunchArgs', () => {
  const identity = testIdentity({ locale: 'fr-FR', viewport: { width: 1440, height: 900 } });

  it('always sets the language and window size from the identity', () => {
    expect(buildLaunchArgs({ antiDetection: false, container: false, identity })).toEqual([
      '--lang=fr-FR',
      '--window-size=1440,900',
    ]);
  });

  it('leads with the automation flag when anti-detection is on', () => {
    const args = buildLaunchArgs({ antiDetection: true, container: false, identity });

    expect(args[0]).toBe('--disable-blink-features=AutomationControlled');
    expect(args).toHaveLength(EVASION_LAUNCH_FLAGS.length + 2);
    expect(args).not.toContain('--no-sandbox');
  });

  it('adds container flags without duplicates', () => {
    const args = buildLaunchArgs({ antiDetection: true, container: true, identity });

    expect(args).toEqual(expect.arrayContaining([...CONTAINER_LAUNCH_FLAGS]));
    expect(new Set(args).size).toBe(args.length);
  });
});
