import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import pino from "pino";
import {
  createRecordingSubmitter,
  createTestConfig,
  createTestDatabase,
  seedTestArticle,
} from "../test-utils/db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { PublishResult, Publisher } from "../publish/telegraph";
import { articles } from "../db/schema";
import { SEMANTIC_DUPLICATE_SENTINEL, getArticleById } from "./dedup";
import { processCandidate, runTick } from "./orchestrator";
import type { PipelineDeps } from "./orchestrator";
import * as pollerModule from "./poller";
import type { ContentTransformer } from "./transformer";

const logger = pino({ level: "silent" });
const HOSTED_URL = "https://telegra.ph/Headline-03-01";

function articlePage(url: string): string {
  return `<html><body><article><p>Body of ${url} long enough to extract.</p></article></body></html>`;
}

function stubPages(status = 200) {
  const mockFetch = vi.fn(async (url: string) => ({
    ok: status === 200,
    status,
    statusText: status === 200 ? "OK" : "Internal Server Error",
    text: async () => articlePage(url),
  }));
  vi.stubGlobal("fetch", mockFetch);
  return mockFetch;
}

function stubFeeds(items: Record<string, ReadonlyArray<string>>) {
  pollerModule.setParserInstance({
    parseURL: vi.fn(async (feedUrl: string) => ({
      items: (items[feedUrl] ?? []).map((link, i) => ({
        title: `Feed title ${i}`,
        link,
        isoDate: new Date(Date.UTC(2026, 2, 1, 12 - i)).toISOString(),
      })),
    })),
  });
}

function createFakeTransformer() {
  return {
    isUnique: vi.fn(async (_content: string, _existing: ReadonlyArray<string>) => true),
    rewrite: vi.fn(async (_content: string) => "<p>Rewritten body</p>"),
    synthesizeHeadline: vi.fn(async () => ({
      title: "Headline",
      description: "Teaser",
      linkPhrase: "Headline",
    })),
    composeSocialPost: vi.fn(async () => "post"),
  } satisfies ContentTransformer;
}

function createFakePublisher() {
  return {
    publish: vi.fn(
      async (_title: string, _html: string): Promise<PublishResult> => ({
        success: true,
        url: HOSTED_URL,
      }),
    ),
  } satisfies Publisher;
}

describe("pipeline orchestrator", () => {
  let db: AppDatabase;
  let config: AppConfig;
  let transformer: ReturnType<typeof createFakeTransformer>;
  let publisher: ReturnType<typeof createFakePublisher>;
  let moderation: ReturnType<typeof createRecordingSubmitter>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let deps: PipelineDeps;

  beforeEach(() => {
    vi.clearAllMocks();
    db = createTestDatabase();
    config = createTestConfig({
      feeds: ["https://feeds.example.com/one"],
      ingest: { interCandidateDelayMs: 1234 },
    });
    transformer = createFakeTransformer();
    publisher = createFakePublisher();
    moderation = createRecordingSubmitter();
    sleep = vi.fn(async (_ms: number) => {});
    deps = { db, config, logger, transformer, publisher, moderation, sleep };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    pollerModule.resetParser();
  });

  describe("processCandidate", () => {
    const candidate = { title: "Feed title", url: "https://example.com/a" };

    it("should host, persist and submit a new article", async () => {
      stubPages();

      const outcome = await processCandidate(candidate, deps);

      expect(outcome).toEqual({
        state: "submitted_for_moderation",
        articleId: 1,
        hostedUrl: HOSTED_URL,
      });
      expect(publisher.publish).toHaveBeenCalledWith("Headline", "<p>Rewritten body</p>");
      expect(getArticleById(db, 1)).toMatchObject({
        originalUrl: "https://example.com/a",
        title: "Headline",
        originalContent: "<p>Body of https://example.com/a long enough to extract.</p>",
        translatedContent: "<p>Rewritten body</p>",
        hostedUrl: HOSTED_URL,
        description: "Teaser",
      });
      expect(moderation.drafts).toEqual([
        {
          title: `<a href="${HOSTED_URL}">Headline</a>`,
          shortDescription: "Teaser",
          sourceUrl: "https://example.com/a",
          articleId: 1,
        },
      ]);
    });

    it("should pass the extracted teaser as the headline fallback", async () => {
      stubPages();

      await processCandidate(candidate, deps);

      expect(transformer.synthesizeHeadline).toHaveBeenCalledWith("<p>Rewritten body</p>", {
        title: "News",
        description: "Body of https://example.com/a long enough to extract",
      });
    });

    it("should prefer the page title over the configured fallback title", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => ({
          ok: true,
          status: 200,
          statusText: "OK",
          text: async () =>
            "<html><body><h1>Harbour reopens.</h1><article><p>Ships are moving again after the long winter storms.</p></article></body></html>",
        })),
      );

      await processCandidate(candidate, deps);

      expect(transformer.synthesizeHeadline).toHaveBeenCalledWith("<p>Rewritten body</p>", {
        title: "Harbour reopens",
        description: "Ships are moving again after the long winter storms",
      });
    });

    it("should skip a stored url without fetching it", async () => {
      const mockFetch = stubPages();
      seedTestArticle(db, { originalUrl: "https://example.com/a" });

      const outcome = await processCandidate(candidate, deps);

      expect(outcome).toEqual({ state: "skipped_existing" });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should compare against today's articles and store a duplicate as seen", async () => {
      stubPages();
      seedTestArticle(db, { originalContent: "<p>Earlier story</p>" });
      transformer.isUnique.mockResolvedValueOnce(false);

      const outcome = await processCandidate(candidate, deps);

      expect(outcome).toEqual({ state: "persisted_as_duplicate", articleId: 2 });
      expect(transformer.isUnique).toHaveBeenCalledWith(
        "<p>Body of https://example.com/a long enough to extract.</p>",
        ["<p>Earlier story</p>"],
      );
      expect(getArticleById(db, 2)).toMatchObject({
        title: "Feed title",
        originalContent: SEMANTIC_DUPLICATE_SENTINEL,
        hostedUrl: null,
      });
      expect(transformer.rewrite).not.toHaveBeenCalled();
      expect(publisher.publish).not.toHaveBeenCalled();
      expect(moderation.drafts).toEqual([]);
    });

    it("should write nothing when extraction fails", async () => {
      stubPages(500);

      const outcome = await processCandidate(candidate, deps);

      expect(outcome).toEqual({
        state: "extraction_failed",
        error: "HTTP 500: Internal Server Error",
      });
      expect(db.select().from(articles).all()).toEqual([]);
      expect(transformer.isUnique).not.toHaveBeenCalled();
    });

    it("should write nothing when hosting fails", async () => {
      stubPages();
      publisher.publish.mockResolvedValueOnce({ success: false, error: "FLOOD_WAIT_5" });

      const outcome = await processCandidate(candidate, deps);

      expect(outcome).toEqual({ state: "hosting_failed", error: "FLOOD_WAIT_5" });
      expect(db.select().from(articles).all()).toEqual([]);
      expect(moderation.drafts).toEqual([]);
    });

    it("should report a conflict when the url was stored while hosting", async () => {
      stubPages();
      publisher.publish.mockImplementationOnce(async () => {
        seedTestArticle(db, { originalUrl: "https://example.com/a", title: "Other run" });
        return { success: true, url: HOSTED_URL };
      });

      const outcome = await processCandidate(candidate, deps);

      expect(outcome).toEqual({ state: "insert_conflict" });
      expect(getArticleById(db, 1)?.title).toBe("Other run");
      expect(moderation.drafts).toEqual([]);
    });

    it("should keep the stored article when submission fails", async () => {
      stubPages();
      const failing = { submit: vi.fn().mockRejectedValue(new Error("chat not found")) };

      const outcome = await processCandidate(candidate, { ...deps, moderation: failing });

      expect(outcome).toEqual({
        state: "moderation_failed",
        articleId: 1,
        hostedUrl: HOSTED_URL,
        error: "chat not found",
      });
      expect(getArticleById(db, 1)?.hostedUrl).toBe(HOSTED_URL);
    });
  });

  describe("runTick", () => {
    it("should process a url only once across ticks", async () => {
      const mockFetch = stubPages();
      stubFeeds({ "https://feeds.example.com/one": ["https://example.com/a"] });

      const first = await runTick(deps);
      const second = await runTick(deps);

      expect(first).toEqual({ candidates: 1, outcomes: { submitted_for_moderation: 1 } });
      expect(second).toEqual({ candidates: 1, outcomes: { skipped_existing: 1 } });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(publisher.publish).toHaveBeenCalledTimes(1);
    });

    it("should never fetch a url a second feed repeats in the same tick", async () => {
      const mockFetch = stubPages();
      const twoFeeds = createTestConfig({
        feeds: ["https://feeds.example.com/one", "https://feeds.example.com/two"],
      });
      stubFeeds({
        "https://feeds.example.com/one": ["https://example.com/shared"],
        "https://feeds.example.com/two": ["https://example.com/shared"],
      });

      const summary = await runTick({ ...deps, config: twoFeeds });

      expect(summary.outcomes).toEqual({ submitted_for_moderation: 1, skipped_existing: 1 });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(moderation.drafts).toHaveLength(1);
    });

    it("should retry a failed extraction on the next tick", async () => {
      stubPages(500);
      stubFeeds({ "https://feeds.example.com/one": ["https://example.com/a"] });

      await runTick(deps);
      stubPages();
      const second = await runTick(deps);

      expect(second.outcomes).toEqual({ submitted_for_moderation: 1 });
    });

    it("should pause between hosted articles but not after the last one", async () => {
      stubPages();
      stubFeeds({
        "https://feeds.example.com/one": ["https://example.com/a", "https://example.com/b"],
      });

      await runTick(deps);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1234);
    });

    it("should not pause after candidates that never reached hosting", async () => {
      stubPages();
      seedTestArticle(db, { originalUrl: "https://example.com/a" });
      stubFeeds({
        "https://feeds.example.com/one": ["https://example.com/a", "https://example.com/b"],
      });

      await runTick(deps);

      expect(sleep).not.toHaveBeenCalled();
    });

    it("should count a throwing candidate and carry on with the batch", async () => {
      stubPages();
      stubFeeds({
        "https://feeds.example.com/one": ["https://example.com/a", "https://example.com/b"],
      });
      transformer.rewrite.mockRejectedValueOnce(new Error("unexpected"));

      const summary = await runTick(deps);

      expect(summary).toEqual({
        candidates: 2,
        outcomes: { failed: 1, submitted_for_moderation: 1 },
      });
    });
  });
});
