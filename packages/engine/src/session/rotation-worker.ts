import { createLogger } from '@tubeveil/logger';
import { mathRandom, sleep as defaultSleep, uniform, type RandomSource, type Sleep } from '../utils/random.js';

const logger = createLogger('RotationWorker');

type RotationWorkerOptions = {
  /** Runs on every wake; failures are logged and the loop continues. */
  onWake: () => Promise<void>;
  wakeSeconds: { min: number; max: number };
  joinTimeoutMs: number;
  rng?: RandomSource;
  sleep?: Sleep;
  onError?: (error: unknown) => void;
};

/**
 * Single background loop per session. It sleeps a random 3-8 s (by default),
 * then calls `onWake`. `stop()` interrupts the sleep and waits a bounded time
 * for the loop to exit.
 */
export class RotationWorker {
  private readonly options: RotationWorkerOptions;
  private readonly rng: RandomSource;
  private readonly sleep: Sleep;
  private stopRequested = false;
  private abort: AbortController | undefined;
  private loop: Promise<void> | undefined;

  constructor(options: RotationWorkerOptions) {
    this.options = options;
    this.rng = options.rng ?? mathRandom;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get running(): boolean {
    return this.loop !== undefined;
  }

  /** No-op when already running. */
  start(): boolean {
    if (this.loop) {
      return false;
    }

    this.stopRequested = false;
    this.abort = new AbortController();
    this.loop = this.run(this.abort.signal).finally(() => {
      this.loop = undefined;
    });
    logger.info('Rotation worker started');
    return true;
  }

  /** Resolves `true` when the loop exited within the join timeout. */
  async stop(): Promise<boolean> {
    const loop = this.loop;
    this.stopRequested = true;
    this.abort?.abort();

    if (!loop) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.options.joinTimeoutMs);
    });

    const joined = await Promise.race([loop.then(() => true as const), timedOut]);
    clearTimeout(timer);

    if (joined) {
      logger.info('Rotation worker stopped');
    } else {
      logger.warn(`Rotation worker did not stop within ${this.options.joinTimeoutMs}ms`);
    }
    return joined;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { wakeSeconds } = this.options;

    while (!this.stopRequested) {
      const waitMs = uniform(this.rng, wakeSeconds.min, wakeSeconds.max) * 1000;
      await this.sleep(waitMs, signal);

      if (this.stopRequested) {
        break;
      }

      try {
        await this.options.onWake();
      } catch (error) {
        logger.warn('Rotation step failed:', error);
        this.options.onError?.(error);
      }
    }
  }
}
