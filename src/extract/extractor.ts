import { ExtractError } from "../core/errors";
import { DocumentTree, ElementNode, describeQuery } from "../crawl";
import { Logger, MetricsRegistry } from "../observability";
import { ExtractedRecord } from "../types";
import { ExtractionProfile } from "./profiles";

/** Title of the page-navigation control that shares the story selector on some layouts. */
export const LOGIN_TITLE = "login";

export interface ExtractOptions {
  /** Log and skip items with a missing field instead of aborting on the first one. */
  skipInvalid: boolean;
  logger: Logger;
  metrics: MetricsRegistry;
}

function selectItems(tree: DocumentTree, profile: ExtractionProfile, logger: Logger): ElementNode[] {
  const items = tree.find(profile.items);
  if (items.length > 0 || !profile.fallbackItems) {
    return items;
  }

  const fallback = tree.find(profile.fallbackItems);
  logger.info("extract_fallback_items", {
    profile: profile.name,
    primary: describeQuery(profile.items),
    fallback: describeQuery(profile.fallbackItems),
    matched: fallback.length,
  });
  return fallback;
}

function readRecord(item: ElementNode, profile: ExtractionProfile, itemIndex: number): ExtractedRecord {
  let rank: string | undefined;
  if (profile.rank) {
    rank = item.first(profile.rank)?.text();
    if (!rank) {
      throw new ExtractError("missing_rank", itemIndex, `no text under ${describeQuery(profile.rank)}`);
    }
  }

  const anchor = profile.title ? item.first(profile.title) : item;
  const title = anchor?.text();
  if (!anchor || !title) {
    const where = profile.title ? describeQuery(profile.title) : describeQuery(profile.items);
    throw new ExtractError("missing_title", itemIndex, `no title text under ${where}`);
  }

  const url = anchor.attr("href");
  if (!url) {
    throw new ExtractError("missing_href", itemIndex, `anchor "${title}" has no href`);
  }

  return rank === undefined ? { title, url } : { rank, title, url };
}

/**
 * Yields one record per story in document order.
 *
 * The generator is lazy and single-pass. In strict mode (the default) the
 * first item missing a rank, title or href throws an `ExtractError`; items
 * whose title is exactly "login" are dropped without error.
 */
export function* extractRecords(
  tree: DocumentTree,
  profile: ExtractionProfile,
  options: ExtractOptions,
): Generator<ExtractedRecord, void, undefined> {
  const { logger, metrics } = options;
  const items = selectItems(tree, profile, logger);
  metrics.incrementCounter("items_matched", items.length);

  for (const [itemIndex, item] of items.entries()) {
    let record: ExtractedRecord;
    try {
      record = readRecord(item, profile, itemIndex);
    } catch (error) {
      if (!(error instanceof ExtractError) || !options.skipInvalid) {
        throw error;
      }
      logger.warn("extract_item_skipped", { profile: profile.name, itemIndex, kind: error.kind, error: error.message });
      metrics.incrementCounter("records_skipped");
      continue;
    }

    if (record.title === LOGIN_TITLE) {
      logger.debug("extract_item_filtered", { profile: profile.name, itemIndex, url: record.url });
      metrics.incrementCounter("records_filtered");
      continue;
    }

    metrics.incrementCounter("records_emitted");
    yield record;
  }
}
