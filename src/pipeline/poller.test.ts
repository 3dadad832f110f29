import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import * as pollerModule from "./poller";

const logger = pino({ level: "silent" });

describe("selectLatest", () => {
  it("should order entries newest first and keep the requested count", () => {
    const result = pollerModule.selectLatest(
      [
        { title: "Old", link: "https://example.com/old", isoDate: "2026-03-01T08:00:00Z" },
        { title: "New", link: "https://example.com/new", isoDate: "2026-03-01T10:00:00Z" },
        { title: "Mid", link: "https://example.com/mid", isoDate: "2026-03-01T09:00:00Z" },
      ],
      2,
    );

    expect(result).toEqual([
      { title: "New", url: "https://example.com/new" },
      { title: "Mid", url: "https://example.com/mid" },
    ]);
  });

  it("should fall back to pubDate and sort undated entries last", () => {
    const result = pollerModule.selectLatest(
      [
        { title: "Undated", link: "https://example.com/undated" },
        { title: "Dated", link: "https://example.com/dated", pubDate: "Sun, 01 Mar 2026 10:00:00 GMT" },
        { title: "Broken", link: "https://example.com/broken", pubDate: "not a date" },
      ],
      5,
    );

    expect(result.map((c) => c.title)).toEqual(["Dated", "Undated", "Broken"]);
  });

  it("should drop entries without a link and default a missing title", () => {
    const result = pollerModule.selectLatest(
      [
        { title: "No link" },
        { title: "  ", link: " https://example.com/a " },
      ],
      5,
    );

    expect(result).toEqual([{ title: "No Title", url: "https://example.com/a" }]);
  });

  it("should return nothing for an empty feed", () => {
    expect(pollerModule.selectLatest([], 5)).toEqual([]);
  });
});

describe("pollFeed", () => {
  beforeEach(() => {
    pollerModule.resetParser();
  });

  afterEach(() => {
    pollerModule.resetParser();
  });

  it("should return the latest candidates of a feed", async () => {
    const parseURL = vi.fn().mockResolvedValue({
      items: [
        { title: "First", link: "https://example.com/1", isoDate: "2026-03-01T08:00:00Z" },
        { title: "Second", link: "https://example.com/2", isoDate: "2026-03-01T09:00:00Z" },
      ],
    });
    pollerModule.setParserInstance({ parseURL });

    const result = await pollerModule.pollFeed("https://example.com/rss", 1, logger);

    expect(parseURL).toHaveBeenCalledWith("https://example.com/rss");
    expect(result).toEqual({
      feedUrl: "https://example.com/rss",
      candidates: [{ title: "Second", url: "https://example.com/2" }],
      error: null,
    });
  });

  it("should return an error and no candidates when the feed cannot be read", async () => {
    pollerModule.setParserInstance({
      parseURL: vi.fn().mockRejectedValue(new Error("Status code 404")),
    });

    const result = await pollerModule.pollFeed("https://example.com/rss", 5, logger);

    expect(result).toEqual({
      feedUrl: "https://example.com/rss",
      candidates: [],
      error: "Status code 404",
    });
  });
});

describe("pollFeeds", () => {
  afterEach(() => {
    pollerModule.resetParser();
  });

  it("should concatenate batches in feed order and skip failing feeds", async () => {
    const parseURL = vi.fn(async (url: string) => {
      if (url === "https://b.example.com/rss") throw new Error("timeout");
      return {
        items: [{ title: url, link: `${url}/item`, isoDate: "2026-03-01T08:00:00Z" }],
      };
    });
    pollerModule.setParserInstance({ parseURL });

    const batch = await pollerModule.pollFeeds(
      ["https://a.example.com/rss", "https://b.example.com/rss", "https://c.example.com/rss"],
      5,
      logger,
    );

    expect(batch.map((c) => c.url)).toEqual([
      "https://a.example.com/rss/item",
      "https://c.example.com/rss/item",
    ]);
  });

  it("should keep the same url twice when two feeds carry it", async () => {
    pollerModule.setParserInstance({
      parseURL: vi.fn().mockResolvedValue({
        items: [{ title: "Shared", link: "https://example.com/shared" }],
      }),
    });

    const batch = await pollerModule.pollFeeds(
      ["https://a.example.com/rss", "https://b.example.com/rss"],
      5,
      logger,
    );

    expect(batch).toHaveLength(2);
  });
});
