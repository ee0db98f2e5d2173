export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogFields {
  url?: string;
  profile?: string;
  itemIndex?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "items_matched"
  | "records_emitted"
  | "records_filtered"
  | "records_skipped";

export type MetricTimerName = "fetch_ms" | "parse_ms" | "extract_ms";
