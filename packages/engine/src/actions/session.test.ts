import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import type { BrowserSurface } from '@tubeveil/browser-driver';
import { loadEngineConfig, type EngineConfig } from '../config/engine-config.js';
import { SessionController } from '../session/session-controller.js';
import { createFakeSurface } from '../testing/fake-surface.js';
import { CANCELLED_MESSAGE, withSession } from './session.js';

const config = loadEngineConfig({ headless: true }, {});

function harness(launch?: () => Promise<BrowserSurface>) {
  const { surface } = createFakeSurface();
  const signals = new EventEmitter();
  const chunks: string[] = [];
  const controllers: SessionController[] = [];

  const createController = (engineConfig: EngineConfig) => {
    const controller = new SessionController(engineConfig, {
      launch: launch ?? (async () => surface),
      findBinary: () => undefined,
      sleep: async () => undefined,
    });
    controllers.push(controller);
    return controller;
  };

  const options = {
    pretty: false,
    createController,
    signals,
    stderr: { write: (chunk: string) => chunks.push(chunk) },
  };

  return { surface, signals, chunks, controllers, options };
}

describe('withSession', () => {
  it('returns the action exit code and closes the session', async () => {
    const { surface, chunks, controllers, options } = harness();
    const run = vi.fn(async (controller: SessionController) => {
      expect(controller.lifecycle).toBe('active');
      return 0;
    });

    const exitCode = await withSession(config, options, run);

    expect(exitCode).toBe(0);
    expect(run).toHaveBeenCalledTimes(1);
    expect(surface.close).toHaveBeenCalledTimes(1);
    expect(controllers[0]?.lifecycle).toBe('closed');
    expect(chunks).toEqual([]);
  });

  it('reports a browser launch failure on stderr', async () => {
    const { chunks, options } = harness(async () => {
      throw new Error('boom');
    });
    const run = vi.fn(async () => 0);

    const exitCode = await withSession(config, options, run);

    expect(exitCode).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(chunks).toEqual(['{"error":"Failed to start browser session: boom"}\n']);
  });

  it('cancels on SIGINT and still closes the session', async () => {
    const { surface, signals, chunks, options } = harness();
    const run = vi.fn(() => {
      signals.emit('SIGINT');
      return new Promise<number>(() => undefined);
    });

    const exitCode = await withSession(config, options, run);

    expect(exitCode).toBe(1);
    expect(chunks).toEqual([`{"error":"${CANCELLED_MESSAGE}"}\n`]);
    expect(surface.close).toHaveBeenCalledTimes(1);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('reports an escaped error as unexpected', async () => {
    const { chunks, options } = harness();

    const exitCode = await withSession(config, options, async () => {
      throw new Error('kaboom');
    });

    expect(exitCode).toBe(1);
    expect(chunks).toEqual(['{"error":"Unexpected error: kaboom"}\n']);
  });

  it('removes its SIGINT listener after a normal run', async () => {
    const { signals, options } = harness();

    await withSession(config, options, async () => 0);

    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});
