import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_crawled: this.getCounter("pages_crawled"),
      pdfs_discovered: this.getCounter("pdfs_discovered"),
      downloads_ok: this.getCounter("downloads_ok"),
      downloads_cached: this.getCounter("downloads_cached"),
      downloads_deduplicated: this.getCounter("downloads_deduplicated"),
      downloads_failed: this.getCounter("downloads_failed"),
      extracts_ok: this.getCounter("extracts_ok"),
      extracts_cached: this.getCounter("extracts_cached"),
      extracts_failed: this.getCounter("extracts_failed"),
      chunks_indexed: this.getCounter("chunks_indexed"),
      values_found: this.getCounter("values_found"),
      values_not_found: this.getCounter("values_not_found"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      download_ms: this.summarize("download_ms"),
      extract_ms: this.summarize("extract_ms"),
      index_build_ms: this.summarize("index_build_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: "info",
        msg: "metrics_summary",
        counters: this.getCounters(),
        timers: this.getTimerSummaries(),
      }),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
