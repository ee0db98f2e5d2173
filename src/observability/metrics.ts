import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

interface TimerSummary {
  count: number;
  totalMs: number;
  maxMs: number;
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

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_fetched: this.counters.get("pages_fetched") ?? 0,
      items_matched: this.counters.get("items_matched") ?? 0,
      records_emitted: this.counters.get("records_emitted") ?? 0,
      records_filtered: this.counters.get("records_filtered") ?? 0,
      records_skipped: this.counters.get("records_skipped") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      fetch_ms: this.summarize("fetch_ms"),
      parse_ms: this.summarize("parse_ms"),
      extract_ms: this.summarize("extract_ms"),
    };
  }

  printSummary(logger: Logger): void {
    logger.debug("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    let totalMs = 0;
    let maxMs = 0;
    for (const value of values) {
      totalMs += value;
      maxMs = Math.max(maxMs, value);
    }
    return { count: values.length, totalMs, maxMs };
  }
}
