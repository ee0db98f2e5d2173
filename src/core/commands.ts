import { AppConfig } from "../config";
import { DocumentTree, parseDocument } from "../crawl";
import { ProfileName, collectLinks, extractRecords, getProfile } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { RendererKind, createRenderer, renderPlainLines } from "../render";
import { HttpGet, fetchPage } from "./fetch";

export interface OutputWriter {
  write(chunk: string): unknown;
}

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  output: OutputWriter;
  httpGet?: HttpGet;
}

export type RecordCommandName = "stories" | "table" | "headlines";

interface RecordCommand {
  renderer: RendererKind;
  defaultProfile: ProfileName;
}

export const RECORD_COMMANDS: Record<RecordCommandName, RecordCommand> = {
  stories: { renderer: "lines", defaultProfile: "ranked" },
  table: { renderer: "table", defaultProfile: "positional" },
  headlines: { renderer: "titles", defaultProfile: "positional" },
};

async function loadPage(ctx: CommandContext): Promise<DocumentTree> {
  const { config, logger, metrics } = ctx;
  logger.info("fetch_start", { url: config.baseUrl });

  const stopFetch = metrics.startTimer("fetch_ms");
  const html = await fetchPage(config.baseUrl, {
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    httpGet: ctx.httpGet,
  });
  metrics.incrementCounter("pages_fetched");
  logger.info("fetch_complete", { url: config.baseUrl, bytes: html.length, durationMs: stopFetch() });

  const stopParse = metrics.startTimer("parse_ms");
  const tree = parseDocument(html);
  logger.debug("parse_complete", { durationMs: stopParse() });
  return tree;
}

function emit(ctx: CommandContext, rendered: string): void {
  if (rendered.length > 0) {
    ctx.output.write(rendered);
  }
}

/**
 * Fetch, parse, extract and render one page of records.
 *
 * Every record is extracted before anything is rendered, so a failure on a
 * later item leaves the output untouched.
 */
export async function runRecordCommand(
  ctx: CommandContext,
  command: RecordCommandName,
  profileName?: ProfileName,
): Promise<number> {
  const { renderer: rendererKind, defaultProfile } = RECORD_COMMANDS[command];
  const profile = getProfile(profileName ?? defaultProfile);
  ctx.logger.info("records_start", { command, profile: profile.name });

  const tree = await loadPage(ctx);

  const stopExtract = ctx.metrics.startTimer("extract_ms");
  const records = Array.from(
    extractRecords(tree, profile, {
      skipInvalid: ctx.config.skipInvalidRecords,
      logger: ctx.logger.child("extract"),
      metrics: ctx.metrics,
    }),
  );
  ctx.logger.info("records_extracted", { profile: profile.name, count: records.length, durationMs: stopExtract() });

  emit(ctx, createRenderer(rendererKind, { color: ctx.config.color }).render(records));
  return records.length;
}

export async function runLinks(ctx: CommandContext): Promise<number> {
  ctx.logger.info("links_start");
  const tree = await loadPage(ctx);
  const links = collectLinks(tree);
  ctx.logger.info("links_collected", { count: links.length });
  emit(ctx, renderPlainLines(links));
  return links.length;
}
