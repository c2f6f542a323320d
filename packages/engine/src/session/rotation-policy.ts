import type { RotationSettings } from '../config/engine-config.js';
import { mathRandom, randomInt, uniform, type RandomSource } from '../utils/random.js';

type RotationState = Readonly<{
  requestCount: number;
  lastRotationAt: number;
  requestThreshold: number;
  intervalSeconds: number;
}>;

type RotationReason = 'request-threshold' | 'interval-elapsed' | 'random-draw';

type RotationPolicySettings = Pick<
  RotationSettings,
  'requestThreshold' | 'intervalSeconds' | 'randomChance'
>;

const DEFAULT_ROTATION_SETTINGS: RotationPolicySettings = {
  requestThreshold: { min: 50, max: 100 },
  intervalSeconds: { min: 600, max: 900 },
  randomChance: 0.05,
};

/**
 * Decides when the session identity is replaced. Thresholds are redrawn on
 * every rotation so the cadence never settles into a fixed period.
 */
export class RotationPolicy {
  private readonly settings: RotationPolicySettings;
  private readonly rng: RandomSource;

  constructor(settings?: Partial<RotationPolicySettings>, rng: RandomSource = mathRandom) {
    this.settings = { ...DEFAULT_ROTATION_SETTINGS, ...settings };
    this.rng = rng;
  }

  initialState(now: number): RotationState {
    return this.onRotated(now);
  }

  /** `draw` defaults to a fresh draw from the policy's random source. */
  evaluate(state: RotationState, now: number, draw: number = this.rng.next()): RotationReason[] {
    const reasons: RotationReason[] = [];

    if (state.requestCount > state.requestThreshold) {
      reasons.push('request-threshold');
    }

    if ((now - state.lastRotationAt) / 1000 > state.intervalSeconds) {
      reasons.push('interval-elapsed');
    }

    if (draw < this.settings.randomChance) {
      reasons.push('random-draw');
    }

    return reasons;
  }

  isDue(state: RotationState, now: number, draw?: number): boolean {
    return this.evaluate(state, now, draw).length > 0;
  }

  onRotated(now: number): RotationState {
    const { requestThreshold, intervalSeconds } = this.settings;
    return {
      requestCount: 0,
      lastRotationAt: now,
      requestThreshold: randomInt(this.rng, requestThreshold.min, requestThreshold.max),
      intervalSeconds: uniform(this.rng, intervalSeconds.min, intervalSeconds.max),
    };
  }
}

export const recordRequest = (state: RotationState): RotationState => ({
  ...state,
  requestCount: state.requestCount + 1,
});

export { DEFAULT_ROTATION_SETTINGS };
export type { RotationPolicySettings, RotationReason, RotationState };
