import fs from "node:fs";
import path from "node:path";
import { vi } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../src/config";
import { CommandContext } from "../src/core/commands";
import { HttpGet, HttpRequestInit, HttpResponse } from "../src/core/fetch";
import { Logger, MetricsRegistry } from "../src/observability";

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "fixtures", name), "utf-8");
}

export function htmlResponse(body: string, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

export function fakeHttpGet(body: string, status = 200) {
  return vi.fn(async (_url: string, _init: HttpRequestInit) => htmlResponse(body, status));
}

export function silentLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test", level: "error" }, () => undefined);
}

export interface CapturedOutput {
  write(chunk: string): void;
  chunks: string[];
  text(): string;
}

export function captureOutput(): CapturedOutput {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
  };
}

export function createTestContext(
  httpGet: HttpGet,
  overrides: Partial<AppConfig> = {},
): CommandContext & { output: CapturedOutput } {
  return {
    runId: "run_test",
    config: { ...DEFAULT_CONFIG, color: false, logLevel: "error", ...overrides },
    logger: silentLogger(),
    metrics: new MetricsRegistry(),
    output: captureOutput(),
    httpGet,
  };
}

/** Wraps story rows in the table markup the front page uses. */
export function storyTable(rows: string): string {
  return `<html><body><table>${rows}</table></body></html>`;
}

export function rankedRow(rank: string, title: string, href?: string): string {
  const hrefAttr = href === undefined ? "" : ` href="${href}"`;
  return (
    `<tr class="athing"><td class="title"><span class="rank">${rank}</span></td>` +
    `<td class="votelinks"></td>` +
    `<td class="title"><span class="titleline"><a${hrefAttr}>${title}</a></span></td></tr>`
  );
}
