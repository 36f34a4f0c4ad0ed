type Labels = Record<string, string>;

export type CounterSummary = { name: string; labels: Labels; value: number };

export type HistogramSummary = { name: string; labels: Labels; count: number; avg: number; max: number };

export type MetricsReport = {
  counters: CounterSummary[];
  histograms: HistogramSummary[];
};

function keyOf(name: string, labels?: Labels): string {
  return `${name}:${JSON.stringify(labels ?? {})}`;
}

/**
 * In-memory counters and histograms for one CLI run or batch. Owned by the
 * caller; the extraction core never touches it.
 */
export class MetricsCollector {
  private counters = new Map<string, CounterSummary>();
  private histograms = new Map<string, { name: string; labels: Labels; values: number[] }>();

  incrementCounter(name: string, labels: Labels = {}): void {
    const key = keyOf(name, labels);
    const entry = this.counters.get(key) ?? { name, labels, value: 0 };
    entry.value++;
    this.counters.set(key, entry);
  }

  recordHistogram(name: string, value: number, labels: Labels = {}): void {
    const key = keyOf(name, labels);
    const entry = this.histograms.get(key) ?? { name, labels, values: [] };
    entry.values.push(value);
    this.histograms.set(key, entry);
  }

  counter(name: string, labels?: Labels): number {
    return this.counters.get(keyOf(name, labels))?.value ?? 0;
  }

  getReport(): MetricsReport {
    const counters = Array.from(this.counters.values(), c => ({ ...c }))
      .sort((a, b) => b.value - a.value);
    const histograms = Array.from(this.histograms.values(), ({ name, labels, values }) => ({
      name,
      labels,
      count: values.length,
      avg: values.reduce((s, v) => s + v, 0) / values.length,
      max: Math.max(...values),
    }));
    return { counters, histograms };
  }
}
