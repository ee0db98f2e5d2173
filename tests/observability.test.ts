import { describe, expect, it } from "vitest";
import { Logger, MetricsRegistry, createRunId } from "../src/observability";

function recordingLogger(level: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = new Logger({ component: "cli", runId: "run_test", level }, (line) => lines.push(line));
  return { logger, entries: () => lines.map((line) => JSON.parse(line)) };
}

describe("Logger", () => {
  it("writes JSON lines with the run context", () => {
    const { logger, entries } = recordingLogger("info");
    logger.info("fetch_start", { url: "https://news.example.test/" });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: "info",
        msg: "fetch_start",
        component: "cli",
        runId: "run_test",
        url: "https://news.example.test/",
      }),
    ]);
  });

  it("drops entries below the configured level", () => {
    const { logger, entries } = recordingLogger("warn");
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(entries().map((entry) => entry.msg)).toEqual(["c", "d"]);
  });

  it("keeps run id, level and writer in child loggers", () => {
    const { logger, entries } = recordingLogger("warn");
    const child = logger.child("extract");
    child.info("hidden");
    child.warn("shown");

    expect(entries()).toEqual([expect.objectContaining({ msg: "shown", component: "extract", runId: "run_test" })]);
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and timers", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("records_emitted");
    metrics.incrementCounter("records_emitted", 2);
    const stop = metrics.startTimer("fetch_ms");
    const duration = stop();

    expect(metrics.getCounters().records_emitted).toBe(3);
    expect(metrics.getTimerSummaries().fetch_ms).toEqual({ count: 1, totalMs: duration, maxMs: duration });
    expect(metrics.getTimerSummaries().parse_ms).toEqual({ count: 0, totalMs: 0, maxMs: 0 });
  });

  it("logs its summary at debug level", () => {
    const { logger, entries } = recordingLogger("debug");
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("pages_fetched");
    metrics.printSummary(logger);

    expect(entries()).toEqual([
      expect.objectContaining({ msg: "metrics_summary", counters: expect.objectContaining({ pages_fetched: 1 }) }),
    ]);
  });
});

describe("createRunId", () => {
  it("embeds the timestamp and a random suffix", () => {
    expect(createRunId(new Date("2024-03-01T12:30:45.123Z"), () => 0.5)).toBe("run_2024-03-01T12-30-45-123Z_i00000");
  });
});
