import { describe, it, expect, vi } from 'vitest';
import type { Sleep } from '../utils/random.js';
import { RotationWorker } from './rotation-worker.js';

/** Sleep that resolves immediately, yielding to the event loop. */
const instantSleep: Sleep = (_ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    setImmediate(resolve);
  });

const settings = { wakeSeconds: { min: 3, max: 8 }, joinTimeoutMs: 200 };

describe('RotationWorker', () => {
  it('wakes repeatedly until stopped', async () => {
    const onWake = vi.fn().mockResolvedValue(undefined);
    const worker = new RotationWorker({ ...settings, onWake, sleep: instantSleep });

    worker.start();
    await vi.waitFor(() => expect(onWake.mock.calls.length).toBeGreaterThanOrEqual(3));

    await expect(worker.stop()).resolves.toBe(true);
    expect(worker.running).toBe(false);

    const calls = onWake.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(onWake.mock.calls.length).toBe(calls);
  });

  it('sleeps between 3 and 8 seconds by default', async () => {
    const waits: number[] = [];
    const recordingSleep: Sleep = (ms, signal) => {
      waits.push(ms);
      return instantSleep(ms, signal);
    };
    const worker = new RotationWorker({
      ...settings,
      onWake: async () => undefined,
      sleep: recordingSleep,
    });

    worker.start();
    await vi.waitFor(() => expect(waits.length).toBeGreaterThanOrEqual(5));
    await worker.stop();

    for (const ms of waits) {
      expect(ms).toBeGreaterThanOrEqual(3_000);
      expect(ms).toBeLessThanOrEqual(8_000);
    }
  });

  it('starting twice is a no-op', async () => {
    const worker = new RotationWorker({ ...settings, onWake: async () => undefined, sleep: instantSleep });

    expect(worker.start()).toBe(true);
    expect(worker.start()).toBe(false);

    await worker.stop();
  });

  it('keeps looping after a failing wake', async () => {
    const onError = vi.fn();
    const onWake = vi
      .fn()
      .mockRejectedValueOnce(new Error('rotation failed'))
      .mockResolvedValue(undefined);
    const worker = new RotationWorker({ ...settings, onWake, onError, sleep: instantSleep });

    worker.start();
    await vi.waitFor(() => expect(onWake.mock.calls.length).toBeGreaterThanOrEqual(2));
    await worker.stop();

    expect(onError).toHaveBeenCalledOnce();
  });

  it('interrupts a long sleep on stop', async () => {
    const onWake = vi.fn().mockResolvedValue(undefined);
    const worker = new RotationWorker({ ...settings, onWake });

    worker.start();
    const started = Date.now();
    await expect(worker.stop()).resolves.toBe(true);

    expect(Date.now() - started).toBeLessThan(1_000);
    expect(onWake).not.toHaveBeenCalled();
  });

  it('gives up joining a hung wake after the timeout', async () => {
    let entered = false;
    const worker = new RotationWorker({
      ...settings,
      joinTimeoutMs: 50,
      sleep: instantSleep,
      onWake: () => {
        entered = true;
        return new Promise<void>(() => undefined);
      },
    });

    worker.start();
    await vi.waitFor(() => expect(entered).toBe(true));

    await expect(worker.stop()).resolves.toBe(false);
  });

  it('stop before start resolves immediately', async () => {
    const worker = new RotationWorker({ ...settings, onWake: async () => undefined });
    await expect(worker.stop()).resolves.toBe(true);
  });
});
