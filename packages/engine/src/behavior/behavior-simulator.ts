import type { BrowserSurface } from '@tubeveil/browser-driver';
import { createLogger } from '@tubeveil/logger';
import type { EngineMetrics } from '../observability/metrics.js';
import {
  gaussian,
  mathRandom,
  pick,
  randomInt,
  sample,
  sleep as defaultSleep,
  uniform,
  type RandomSource,
  type Sleep,
} from '../utils/random.js';

const logger = createLogger('BehaviorSimulator');

const DELAY_PROFILES = ['steady', 'segmented', 'burst', 'scaled'] as const;
const INTERACTIONS = ['pointer-move', 'scroll', 'idle-pause', 'read-time-estimate'] as const;
const SCROLL_OFFSETS = [100, 200, 300, -150, -250, 400, 500] as const;

type DelayProfile = (typeof DELAY_PROFILES)[number];
type Interaction = (typeof INTERACTIONS)[number];

type InteractionOutcome = {
  interaction: Interaction;
  ok: boolean;
};

type BehaviorSimulatorOptions = {
  rng?: RandomSource;
  sleep?: Sleep;
  metrics?: EngineMetrics;
};

const JITTER_STD_DEV = 0.3;
const MIN_DELAY_SECONDS = 0.1;
const LAZY_LOAD_SCROLL_Y = 300;
const MAX_READ_SECONDS = 5;

/**
 * Human-like timing and page interaction. All durations in the public API are
 * in seconds.
 */
export class BehaviorSimulator {
  private readonly rng: RandomSource;
  private readonly sleep: Sleep;
  private readonly metrics: EngineMetrics | undefined;

  constructor(options: BehaviorSimulatorOptions = {}) {
    this.rng = options.rng ?? mathRandom;
    this.sleep = options.sleep ?? defaultSleep;
    this.metrics = options.metrics;
  }

  /** uniform(min, max) plus N(0, 0.3) jitter, never below 0.1. */
  delay(min: number, max: number): number {
    const base = uniform(this.rng, min, max);
    return Math.max(MIN_DELAY_SECONDS, base + gaussian(this.rng, 0, JITTER_STD_DEV));
  }

  /** Sleeps a `delay(min, max)` budget shaped by a randomly chosen profile. */
  async pause(min: number, max: number): Promise<DelayProfile> {
    const budget = this.delay(min, max);
    const profile = pick(this.rng, DELAY_PROFILES);
    logger.debug(`Pausing ${budget.toFixed(2)}s (${profile})`);

    switch (profile) {
      case 'steady':
        await this.sleepSeconds(budget);
        break;

      case 'segmented': {
        let remaining = budget;
        while (remaining > 0) {
          const slice = Math.min(uniform(this.rng, 0.1, 0.5), remaining);
          await this.sleepSeconds(slice);
          remaining -= slice;
        }
        break;
      }

      case 'burst': {
        const slices = randomInt(this.rng, 2, 5);
        for (let i = 0; i < slices; i += 1) {
          await this.sleepSeconds(budget / slices + uniform(this.rng, -0.1, 0.1));
        }
        break;
      }

      case 'scaled':
        await this.sleepSeconds(budget * uniform(this.rng, 0.8, 1.2));
        break;
    }

    return profile;
  }

  /**
   * Runs 1-3 distinct interactions. A failing interaction is logged and
   * counted; the rest still run.
   */
  async simulateInteraction(surface: BrowserSurface): Promise<InteractionOutcome[]> {
    const chosen = sample(this.rng, INTERACTIONS, randomInt(this.rng, 1, 3));
    const outcomes: InteractionOutcome[] = [];

    for (const interaction of chosen) {
      try {
        await this.run(interaction, surface);
        outcomes.push({ interaction, ok: true });
      } catch (error) {
        logger.warn(`Interaction "${interaction}" failed:`, error);
        this.metrics?.increment('behavior.step_failed');
        outcomes.push({ interaction, ok: false });
      }
    }

    return outcomes;
  }

  async scrollForLazyLoad(surface: BrowserSurface): Promise<void> {
    await surface.evaluate(`window.scrollTo(0, ${LAZY_LOAD_SCROLL_Y})`);
  }

  private async run(interaction: Interaction, surface: BrowserSurface): Promise<void> {
    switch (interaction) {
      case 'pointer-move': {
        const moves = randomInt(this.rng, 1, 3);
        for (let i = 0; i < moves; i += 1) {
          const x = randomInt(this.rng, 50, 800);
          const y = randomInt(this.rng, 50, 600);
          await surface.moveMouse(x, y, randomInt(this.rng, 5, 15));
          await this.sleepSeconds(uniform(this.rng, 0.1, 0.3));
        }
        return;
      }

      case 'scroll':
        await surface.evaluate(`window.scrollBy(0, ${pick(this.rng, SCROLL_OFFSETS)})`);
        await this.sleepSeconds(uniform(this.rng, 0.5, 1.5));
        return;

      case 'idle-pause':
        await this.sleepSeconds(uniform(this.rng, 1, 3));
        return;

      case 'read-time-estimate':
        await this.sleepSeconds(await this.readingSeconds(surface));
        return;
    }
  }

  /** 250 words per minute at 5 characters a word, skimmed at 10-30 %, capped at 5 s. */
  private async readingSeconds(surface: BrowserSurface): Promise<number> {
    let length: unknown;
    try {
      length = await surface.evaluate('document.body ? document.body.innerText.length : 0');
    } catch (error) {
      logger.debug('Could not measure page text, using a plain pause:', error);
      return uniform(this.rng, 1, 3);
    }

    if (typeof length !== 'number' || !Number.isFinite(length)) {
      return uniform(this.rng, 1, 3);
    }

    const fullRead = (length / 5 / 250) * 60;
    return Math.min(fullRead * uniform(this.rng, 0.1, 0.3), MAX_READ_SECONDS);
  }

  private sleepSeconds(seconds: number): Promise<void> {
    return this.sleep(Math.max(0, seconds) * 1000);
  }
}

export { DELAY_PROFILES, INTERACTIONS };
export type { DelayProfile, Interaction, InteractionOutcome };
