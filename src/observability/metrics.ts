/**
 * Metrics collection for monitoring and observability
 */

export interface MetricsCollector {
  incrementCounter(name: string, value: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters = new Map<string, number>();
  private histograms = new Map<string, number[]>();

  incrementCounter(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value: number, _labels?: Record<string, string>): void {}
  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {}
}

export const MetricNames = {
  REQUEST_COUNT: 'prism.requests.total',
  REQUEST_DURATION_MS: 'prism.requests.duration_ms',
  REQUEST_ERRORS: 'prism.requests.errors',
  PAGES_FETCHED: 'prism.pager.pages',
  FILES_STAGED: 'prism.staging.files_staged',
  FILES_SKIPPED: 'prism.staging.files_skipped',
  BUCKETS_CREATED: 'prism.buckets.created',
  BUCKETS_COMPLETED: 'prism.buckets.completed',
} as const;
