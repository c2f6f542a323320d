import { describe, it, expect, vi } from 'vitest';
import { createFakeSurface } from '../testing/fake-surface.js';
import { EngineMetrics } from '../observability/metrics.js';
import { createSeededRandom, type RandomSource, type Sleep } from '../utils/random.js';
import { BehaviorSimulator } from './behavior-simulator.js';

/** Returns queued draws first, then `fallback` forever. */
const queued = (values: number[], fallback = 0.5): RandomSource => {
  const queue = [...values];
  return { next: () => queue.shift() ?? fallback };
};

function recordingSleep() {
  const sleeps: number[] = [];
  const sleep: Sleep = async (ms) => {
    sleeps.push(ms);
  };
  return { sleeps, sleep };
}

describe('BehaviorSimulator.delay', () => {
  it('is uniform plus zero jitter at the median draw', () => {
    // uniform 0.5 -> 3; u1 = 1 - 0 -> jitter 0
    const simulator = new BehaviorSimulator({ rng: queued([0.5, 0, 0.25]) });
    expect(simulator.delay(2, 4)).toBe(3);
  });

  it('never goes below 0.1 seconds', () => {
    // u1 = 0.001, cos(pi) = -1 -> jitter of about -1.1
    const simulator = new BehaviorSimulator({ rng: queued([0, 0.999, 0.5]) });
    expect(simulator.delay(0, 0)).toBe(0.1);

    const seeded = new BehaviorSimulator({ rng: createSeededRandom(17) });
    for (let i = 0; i < 500; i += 1) {
      expect(seeded.delay(0, 0.2)).toBeGreaterThanOrEqual(0.1);
    }
  });
});

describe('BehaviorSimulator.pause', () => {
  // delay draws: uniform 0.5 -> 3s, jitter 0; then the profile draw
  const budgetDraws = [0.5, 0, 0.25];

  it('steady sleeps the whole budget once', async () => {
    const { sleeps, sleep } = recordingSleep();
    const simulator = new BehaviorSimulator({ rng: queued([...budgetDraws, 0]), sleep });

    await expect(simulator.pause(2, 4)).resolves.toBe('steady');
    expect(sleeps).toEqual([3000]);
  });

  it('segmented spends the budget in micro pauses', async () => {
    const { sleeps, sleep } = recordingSleep();
    const simulator = new BehaviorSimulator({ rng: queued([...budgetDraws, 0.3]), sleep });

    await expect(simulator.pause(2, 4)).resolves.toBe('segmented');
    expect(sleeps.length).toBeGreaterThanOrEqual(10);
    for (const ms of sleeps) {
      expect(ms).toBeLessThanOrEqual(500);
    }
    expect(sleeps.reduce((sum, ms) => sum + ms, 0)).toBeCloseTo(3000, 6);
  });

  it('burst splits the budget into 2-5 slices', async () => {
    const { sleeps, sleep } = recordingSleep();
    const simulator = new BehaviorSimulator({ rng: queued([...budgetDraws, 0.6]), sleep });

    await expect(simulator.pause(2, 4)).resolves.toBe('burst');
    expect(sleeps).toEqual([750, 750, 750, 750]);
  });

  it('scaled stretches the budget by 0.8-1.2', async () => {
    const { sleeps, sleep } = recordingSleep();
    const simulator = new BehaviorSimulator({ rng: queued([...budgetDraws, 0.9, 0.75]), sleep });

    await expect(simulator.pause(2, 4)).resolves.toBe('scaled');
    expect(sleeps).toHaveLength(1);
    expect(sleeps[0]).toBeCloseTo(3300, 6);
  });
});

describe('BehaviorSimulator.simulateInteraction', () => {
  it('runs distinct interactions against the surface', async () => {
    const { sleeps, sleep } = recordingSleep();
    const { surface } = createFakeSurface();
    surface.evaluate.mockImplementation(async (script: string) =>
      script.includes('innerText') ? 12_500 : undefined,
    );
    // 3 interactions: pointer-move, read-time-estimate, scroll
    const simulator = new BehaviorSimulator({ rng: queued([0.99, 0, 0.99, 0]), sleep });

    const outcomes = await simulator.simulateInteraction(surface);

    expect(outcomes).toEqual([
      { interaction: 'pointer-move', ok: true },
      { interaction: 'read-time-estimate', ok: true },
      { interaction: 'scroll', ok: true },
    ]);
    expect(surface.moveMouse).toHaveBeenCalledTimes(2);
    expect(surface.moveMouse).toHaveBeenCalledWith(425, 325, 10);
    expect(surface.evaluate).toHaveBeenCalledWith('window.scrollBy(0, -150)');
    // two pointer pauses, reading capped at 5s, post-scroll pause
    expect(sleeps).toEqual([200, 200, 5000, 1000]);
  });

  it('isolates a failing interaction', async () => {
    const metrics = new EngineMetrics();
    const { sleep } = recordingSleep();
    const { surface } = createFakeSurface();
    surface.evaluate.mockRejectedValue(new Error('Execution context was destroyed'));
    // 2 interactions: idle-pause, scroll
    const simulator = new BehaviorSimulator({ rng: queued([]), sleep, metrics });

    const outcomes = await simulator.simulateInteraction(surface);

    expect(outcomes).toEqual([
      { interaction: 'idle-pause', ok: true },
      { interaction: 'scroll', ok: false },
    ]);
    expect(metrics.count('behavior.step_failed')).toBe(1);
  });

  it('falls back to a plain pause when the page text cannot be measured', async () => {
    const { sleeps, sleep } = recordingSleep();
    const { surface } = createFakeSurface();
    surface.evaluate.mockRejectedValue(new Error('detached'));
    // 1 interaction: read-time-estimate
    const simulator = new BehaviorSimulator({ rng: queued([0, 0.99]), sleep });

    const outcomes = await simulator.simulateInteraction(surface);

    expect(outcomes).toEqual([{ interaction: 'read-time-estimate', ok: true }]);
    expect(sleeps).toEqual([2000]);
  });
});

describe('BehaviorSimulator.scrollForLazyLoad', () => {
  it('scrolls to 300px', async () => {
    const { surface } = createFakeSurface();
    await new BehaviorSimulator({ sleep: vi.fn() }).scrollForLazyLoad(surface);
    expect(surface.evaluate).toHaveBeenCalledWith('window.scrollTo(0, 300)');
  });
});
