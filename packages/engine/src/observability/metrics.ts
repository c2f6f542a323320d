import type { LogFn } from '@tubeveil/logger';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  durations: Record<string, DurationSummary>;
};

const summarize = (values: readonly number[]): DurationSummary => {
  const count = values.length;
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count,
    min: count > 0 ? Math.min(...values) : 0,
    max: count > 0 ? Math.max(...values) : 0,
    avg: count > 0 ? total / count : 0,
    total,
  };
};

/**
 * Per-session counters. Names are dotted (`rotation.completed`,
 * `evasion.patch_failed`) and logged once when the session closes.
 */
export class EngineMetrics {
  private readonly counters: Map<string, number>;
  private readonly gauges: Map<string, number>;
  private readonly durations: Map<string, number[]>;

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.durations = new Map();
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordDuration(name: string, ms: number): void {
    const values = this.durations.get(name);
    if (values) {
      values.push(ms);
    } else {
      this.durations.set(name, [ms]);
    }
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  snapshot(): MetricSnapshot {
    const durations: Record<string, DurationSummary> = {};
    for (const [name, values] of this.durations) {
      durations[name] = summarize(values);
    }

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      durations,
    };
  }

  log(logger: { info: LogFn }): void {
    logger.info('Session metrics', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.durations.clear();
  }
}

export type { DurationSummary, MetricSnapshot };
