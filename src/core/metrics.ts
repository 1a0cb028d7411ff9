export interface Metrics {
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  gauge(name: string, value: number, tags?: Record<string, string>): void;
}

/** `name{a=1,b=2}` with tag keys sorted, or the bare name when untagged. */
export const metricKey = (name: string, tags?: Record<string, string>): string => {
  if (!tags) return name;
  const keys = Object.keys(tags).sort();
  if (keys.length === 0) return name;
  return `${name}{${keys.map((k) => `${k}=${tags[k]}`).join(',')}}`;
};

export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();

  increment(name: string, value = 1, tags?: Record<string, string>): void {
    const key = metricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    this.gauges.set(metricKey(name, tags), value);
  }

  counter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(metricKey(name, tags)) ?? 0;
  }

  snapshot(): { counters: Record<string, number>; gauges: Record<string, number> } {
    return {
      counters: Object.fromEntries(this.counters.entries()),
      gauges: Object.fromEntries(this.gauges.entries())
    };
  }
}
