import { mathRandom, uniform, type RandomSource } from '../utils/random.js';
import type { BlockReason, NavigationFailureClass, RetryDecision } from './types.js';

type ClassifyInput = {
  error?: unknown;
  blockReason?: BlockReason;
  surfaceConnected?: boolean;
};

type RetryStrategyConfig = {
  maxTimeoutContinues: number;
  maxNetworkRetries: number;
  maxBlockRotations: number;
};

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxTimeoutContinues: 1,
  maxNetworkRetries: 1,
  maxBlockRotations: 1,
};

const CLOSED_MARKERS = ['target closed', 'has been closed', 'browser has disconnected', 'session closed'];
const NETWORK_MARKERS = [
  'net::err_',
  'econnreset',
  'econnrefused',
  'enotfound',
  'socket hang up',
  'network',
];

const describeError = (error: unknown): { name: string; message: string } =>
  error instanceof Error
    ? { name: error.name, message: error.message.toLowerCase() }
    : { name: '', message: String(error ?? '').toLowerCase() };

/**
 * Decides what a failed page load turns into. Every class has its own small
 * budget; once spent, the navigation fails.
 */
export class NavigationRetryStrategy {
  private readonly config: RetryStrategyConfig;
  private readonly rng: RandomSource;

  constructor(config?: Partial<RetryStrategyConfig>, rng: RandomSource = mathRandom) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.rng = rng;
  }

  classify(input: ClassifyInput): NavigationFailureClass {
    if (input.blockReason) {
      return 'blocked';
    }

    if (input.surfaceConnected === false) {
      return 'closed';
    }

    const { name, message } = describeError(input.error);

    if (CLOSED_MARKERS.some(marker => message.includes(marker))) {
      return 'closed';
    }

    if (name === 'TimeoutError' || message.includes('timeout') || message.includes('timed out')) {
      return 'timeout';
    }

    if (NETWORK_MARKERS.some(marker => message.includes(marker))) {
      return 'network';
    }

    return 'system';
  }

  /** `attempt` counts earlier decisions of the same class for this navigation. */
  decide(errorClass: NavigationFailureClass, attempt: number): RetryDecision {
    switch (errorClass) {
      case 'timeout':
        return {
          action: attempt < this.config.maxTimeoutContinues ? 'continue' : 'fail',
          delayMs: 0,
          errorClass,
        };

      case 'network':
        return {
          action: attempt < this.config.maxNetworkRetries ? 'retry' : 'fail',
          delayMs: uniform(this.rng, 1000, 2000),
          errorClass,
        };

      case 'blocked':
        return {
          action: attempt < this.config.maxBlockRotations ? 'rotate' : 'fail',
          delayMs: uniform(this.rng, 2000, 4000),
          errorClass,
        };

      case 'closed':
      case 'system':
        return { action: 'fail', delayMs: 0, errorClass };
    }
  }
}

export type { ClassifyInput, RetryStrategyConfig };
