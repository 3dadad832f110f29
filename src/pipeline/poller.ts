import Parser from "rss-parser";
import type { Logger } from "pino";
import type { Candidate, PollResult } from "./types";

type FeedItem = Parser.Item;

/**
 * The part of rss-parser the poller uses; tests swap in a stub.
 */
export type FeedParser = Pick<Parser, "parseURL">;

let parserInstance: FeedParser | null = null;

export function createParser(): Parser {
  return new Parser({
    timeout: 15000,
    headers: { "User-Agent": "Mozilla/5.0 (compatible; newsgate/0.1)" },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

function publishedTime(item: FeedItem): number {
  const raw = item.isoDate ?? item.pubDate;
  if (!raw) return Number.NEGATIVE_INFINITY;
  const time = new Date(raw).getTime();
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Newest entries first; undated entries sort as the earliest possible.
 * Entries without a link are dropped since there is nothing to fetch.
 */
export function selectLatest(
  items: ReadonlyArray<FeedItem>,
  count: number,
): Array<Candidate> {
  return items
    .filter((item) => typeof item.link === "string" && item.link.trim() !== "")
    .map((item) => ({ item, time: publishedTime(item) }))
    .sort((a, b) => b.time - a.time)
    .slice(0, count)
    .map(({ item }) => ({
      title: item.title?.trim() || "No Title",
      url: (item.link ?? "").trim(),
    }));
}

/**
 * Fetches one feed and returns its `count` latest entries. Never throws:
 * unreachable or malformed feeds come back with no candidates and an error.
 */
export async function pollFeed(
  feedUrl: string,
  count: number,
  logger: Logger,
): Promise<PollResult> {
  try {
    const parser = getParserInstance();
    const feed = await parser.parseURL(feedUrl);
    const candidates = selectLatest(feed.items, count);

    logger.info(
      { feedUrl, itemCount: feed.items.length, selected: candidates.length },
      "feed polled successfully",
    );
    return { feedUrl, candidates, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedUrl, error: message }, "feed poll failed");
    return { feedUrl, candidates: [], error: message };
  }
}

/**
 * Polls every feed in order and concatenates the batches. The same URL may
 * appear twice; the store decides what is new.
 */
export async function pollFeeds(
  feedUrls: ReadonlyArray<string>,
  count: number,
  logger: Logger,
): Promise<Array<Candidate>> {
  const batch: Array<Candidate> = [];
  for (const feedUrl of feedUrls) {
    const result = await pollFeed(feedUrl, count, logger);
    batch.push(...result.candidates);
  }
  return batch;
}
