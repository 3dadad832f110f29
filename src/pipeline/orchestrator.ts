// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { Publisher } from "../publish/telegraph";
import type { ModerationSubmitter } from "../moderation/gateway";
import {
  SEMANTIC_DUPLICATE_SENTINEL,
  articleExists,
  getRecentSameDayContent,
  insertArticleBase,
  updateArticleFinal,
} from "./dedup";
import { extractArticle } from "./extract-article";
import { UNTITLED } from "./extractor";
import { renderHeadlineHtml } from "./headline";
import { pollFeeds } from "./poller";
import type { ContentTransformer } from "./transformer";
import type { Candidate, CandidateOutcome, TickSummary } from "./types";

export type PipelineDeps = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly transformer: ContentTransformer;
  readonly publisher: Publisher;
  readonly moderation: ModerationSubmitter;
  readonly sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Takes one candidate as far as it can go:
 * exists? → extract → duplicate check → rewrite + headline → host → persist → submit.
 *
 * The store lookup comes first and the rewrite comes after the duplicate
 * check, so seen URLs cost nothing and duplicates never pay for a rewrite.
 * Nothing is written before hosting succeeds, except the sentinel row for a
 * duplicate; a failed fetch, extraction or hosting call leaves the URL free
 * to be retried on the next tick.
 */
export async function processCandidate(
  candidate: Candidate,
  deps: PipelineDeps,
): Promise<CandidateOutcome> {
  const { db, config, transformer, publisher, moderation } = deps;
  const logger = deps.logger.child({ url: candidate.url });

  if (articleExists(db, candidate.url)) {
    logger.debug("already stored, skipping");
    return { state: "skipped_existing" };
  }

  const extraction = await extractArticle(
    candidate.url,
    config.ingest.fetchTimeoutMs,
    logger,
  );
  if (!extraction.success) {
    logger.info(
      { reason: extraction.reason, error: extraction.error },
      "extraction failed, will retry next tick",
    );
    return { state: "extraction_failed", error: extraction.error };
  }
  const extracted = extraction.result;
  logger.debug({ strategy: extracted.strategy }, "extracted");

  const comparison = getRecentSameDayContent(db, config.transform.comparisonLimit);
  const unique = await transformer.isUnique(extracted.contentHtml, comparison);
  if (!unique) {
    const articleId = insertArticleBase(db, {
      url: candidate.url,
      title: candidate.title,
      content: SEMANTIC_DUPLICATE_SENTINEL,
    });
    logger.info({ articleId }, "semantic duplicate, stored as seen");
    return { state: "persisted_as_duplicate", articleId };
  }

  const rewritten = await transformer.rewrite(extracted.contentHtml);
  const headline = await transformer.synthesizeHeadline(rewritten, {
    title:
      extracted.title === UNTITLED ? config.transform.fallbackTitle : extracted.title,
    description: extracted.shortDescription || config.transform.fallbackDescription,
  });
  logger.debug({ title: headline.title }, "transformed");

  const hosted = await publisher.publish(headline.title, rewritten);
  if (!hosted.success) {
    logger.warn({ error: hosted.error }, "hosting failed, dropping candidate");
    return { state: "hosting_failed", error: hosted.error };
  }

  const articleId = insertArticleBase(db, {
    url: candidate.url,
    title: headline.title,
    content: extracted.contentHtml,
    description: headline.description,
    imageUrl: extracted.imageUrl,
  });
  if (articleId === null) {
    logger.warn(
      { hostedUrl: hosted.url },
      "url stored concurrently, hosted page left orphaned",
    );
    return { state: "insert_conflict" };
  }
  updateArticleFinal(db, articleId, rewritten, hosted.url);
  logger.debug({ articleId, hostedUrl: hosted.url }, "persisted");

  try {
    await moderation.submit({
      title: renderHeadlineHtml(headline, hosted.url),
      shortDescription: headline.description,
      sourceUrl: candidate.url,
      articleId,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { articleId, error: message },
      "moderation submit failed, article stays stored and hosted",
    );
    return {
      state: "moderation_failed",
      articleId,
      hostedUrl: hosted.url,
      error: message,
    };
  }

  return { state: "submitted_for_moderation", articleId, hostedUrl: hosted.url };
}

/**
 * One tick: poll every feed, then run the candidates strictly one after
 * another, pausing between articles that reached the hosting service.
 * A failing candidate never stops the batch.
 */
export async function runTick(deps: PipelineDeps): Promise<TickSummary> {
  const { config, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;

  logger.info({ feedCount: config.feeds.length }, "tick starting");
  const candidates = await pollFeeds(
    config.feeds,
    config.ingest.articlesPerFeed,
    logger,
  );

  const outcomes: Partial<Record<CandidateOutcome["state"] | "failed", number>> = {};
  const count = (key: CandidateOutcome["state"] | "failed") => {
    outcomes[key] = (outcomes[key] ?? 0) + 1;
  };

  for (const [index, candidate] of candidates.entries()) {
    let outcome: CandidateOutcome;
    try {
      outcome = await processCandidate(candidate, deps);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ url: candidate.url, error: message }, "candidate failed");
      count("failed");
      continue;
    }
    count(outcome.state);

    const reachedHosting =
      outcome.state === "submitted_for_moderation" ||
      outcome.state === "moderation_failed";
    if (reachedHosting && index < candidates.length - 1) {
      await sleep(config.ingest.interCandidateDelayMs);
    }
  }

  const summary: TickSummary = { candidates: candidates.length, outcomes };
  logger.info(summary, "tick complete");
  return summary;
}
