export interface MetricsRecorder {
  increment(metric: string, tags?: Record<string, string>): void;
  observe(metric: string, value: number, tags?: Record<string, string>): void;
}

export class NoopMetrics implements MetricsRecorder {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  increment(_metric: string, _tags?: Record<string, string>): void {}
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  observe(_metric: string, _value: number, _tags?: Record<string, string>): void {}
}

export interface ObservationSummary {
  readonly count: number;
  readonly sum: number;
  readonly min: number;
  readonly max: number;
}

export interface MetricsSnapshot {
  readonly counters: Record<string, number>;
  readonly observations: Record<string, ObservationSummary>;
}

function buildKey(metric: string, tags?: Record<string, string>): string {
  if (!tags) {
    return metric;
  }
  const parts = Object.keys(tags)
    .sort()
    .map((key) => `${key}=${tags[key]}`);
  return parts.length > 0 ? `${metric}{${parts.join(",")}}` : metric;
}

/** Keeps counters and value summaries in process memory, keyed by metric name plus sorted tags. */
export class InMemoryMetrics implements MetricsRecorder {
  private readonly counters = new Map<string, number>();
  private readonly observations = new Map<string, ObservationSummary>();

  increment(metric: string, tags?: Record<string, string>): void {
    const key = buildKey(metric, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  observe(metric: string, value: number, tags?: Record<string, string>): void {
    if (!Number.isFinite(value)) {
      return;
    }
    const key = buildKey(metric, tags);
    const current = this.observations.get(key);
    this.observations.set(key, current
      ? {
          count: current.count + 1,
          sum: current.sum + value,
          min: Math.min(current.min, value),
          max: Math.max(current.max, value),
        }
      : { count: 1, sum: value, min: value, max: value });
  }

  getCounter(metric: string, tags?: Record<string, string>): number {
    return this.counters.get(buildKey(metric, tags)) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(this.counters),
      observations: Object.fromEntries(this.observations),
    };
  }

  reset(): void {
    this.counters.clear();
    this.observations.clear();
  }
}
