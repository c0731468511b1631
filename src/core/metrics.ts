/**
 * Execution metrics: in-process counters and histograms.
 */

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { values: number[]; tags?: Tags }[]>;
  collectedAt: string;
}

interface CounterEntry {
  value: number;
  tags?: Tags;
}

interface HistogramEntry {
  values: number[];
  tags?: Tags;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function bucket<E>(store: Map<string, Map<string, E>>, name: string): Map<string, E> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, CounterEntry>>();
  private histograms = new Map<string, Map<string, HistogramEntry>>();

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = bucket(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = bucket(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      byTags.set(key, { values: [value], tags });
    }
  }

  /** Counter value for exact tags, or the sum over every tag combination. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return [...(byTags.get(tagsKey(tags))?.values ?? [])];
    const all: number[] = [];
    for (const entry of byTags.values()) all.push(...entry.values);
    return all;
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values(), e => ({ ...e }));
    }
    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) {
      histograms[name] = Array.from(byTags.values(), e => ({ ...e, values: [...e.values] }));
    }
    return { counters, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

/** Process-wide collector shared by the chain, gate and executor. */
export const globalMetrics = new MetricsCollector();
