export interface TimingSummary {
  count: number;
  totalMs: number;
  maxMs: number;
  lastMs: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  timings: Record<string, TimingSummary>;
}

/**
 * Append-only sink the pipeline reports into. Calls are synchronous and must not block.
 */
export interface MetricsSink {
  increment(name: string, by?: number): void;
  recordTiming(name: string, milliseconds: number): void;
  snapshot(): MetricsSnapshot;
}

export class InMemoryMetrics implements MetricsSink {
  private counters = new Map<string, number>();
  private timings = new Map<string, TimingSummary>();

  increment(name: string, by = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  recordTiming(name: string, milliseconds: number): void {
    const current = this.timings.get(name) ?? { count: 0, totalMs: 0, maxMs: 0, lastMs: 0 };
    this.timings.set(name, {
      count: current.count + 1,
      totalMs: current.totalMs + milliseconds,
      maxMs: Math.max(current.maxMs, milliseconds),
      lastMs: milliseconds,
    });
  }

  snapshot(): MetricsSnapshot {
    const timings: Record<string, TimingSummary> = {};
    for (const [name, summary] of this.timings) {
      timings[name] = { ...summary };
    }
    return {
      counters: Object.fromEntries(this.counters),
      timings,
    };
  }
}
