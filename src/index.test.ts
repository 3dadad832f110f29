import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdirSync, rmSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { createDatabase } from "./db";
import { articleExists, insertArticleBase } from "./pipeline/dedup";

/**
 * Startup wiring checked piece by piece, without starting the process:
 * configuration, the database file and structured logging.
 */

const secrets = {
  TELEGRAM_BOT_TOKEN: "test-secret",
  TELEGRAPH_ACCESS_TOKEN: "test-secret",
  LLM_API_KEY: "test-secret",
};

const validYaml = `
llm:
  provider: anthropic
  model: claude-test
feeds:
  - https://example.com/rss
telegram:
  reviewChatId: -1001111111111
  publicChatId: "@newsgate_test"
`;

describe("entry point and integration", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `newsgate-test-${Date.now()}-${Math.random()}`);
    mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(tmpDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  describe("configuration", () => {
    it("should load a valid file, apply defaults and take secrets from the environment", () => {
      const config = loadConfig(writeConfig("ok.yaml", validYaml), secrets);

      expect(config.feeds).toEqual(["https://example.com/rss"]);
      expect(config.telegram.publicChatId).toBe("@newsgate_test");
      expect(config.ingest).toEqual({
        articlesPerFeed: 5,
        pollIntervalSeconds: 300,
        interCandidateDelayMs: 5000,
        fetchTimeoutMs: 15000,
      });
      expect(config.secrets).toEqual({
        telegramBotToken: "test-secret",
        telegraphAccessToken: "test-secret",
        llmApiKey: "test-secret",
      });
    });

    it("should name every missing secret", () => {
      const configPath = writeConfig("ok.yaml", validYaml);

      expect(() => loadConfig(configPath, { TELEGRAM_BOT_TOKEN: " " })).toThrow(
        `invalid configuration in ${configPath}:\n` +
          "  - secrets.telegramBotToken: TELEGRAM_BOT_TOKEN is required\n" +
          "  - secrets.telegraphAccessToken: TELEGRAPH_ACCESS_TOKEN is required",
      );
    });

    it("should require an api key for hosted providers only", () => {
      const hosted = writeConfig("hosted.yaml", validYaml);
      const local = writeConfig("local.yaml", validYaml.replace("anthropic", "ollama"));
      const { LLM_API_KEY: _unused, ...withoutKey } = secrets;

      expect(() => loadConfig(hosted, withoutKey)).toThrow(
        "secrets.llmApiKey: LLM_API_KEY is required for provider anthropic",
      );
      expect(loadConfig(local, withoutKey).secrets.llmApiKey).toBeUndefined();
    });

    it("should reject values outside their ranges", () => {
      const configPath = writeConfig(
        "range.yaml",
        `${validYaml}ingest:\n  articlesPerFeed: 11\n  pollIntervalSeconds: 5\n`,
      );

      expect(() => loadConfig(configPath, secrets)).toThrow(/ingest\.articlesPerFeed/);
      expect(() => loadConfig(configPath, secrets)).toThrow(/ingest\.pollIntervalSeconds/);
    });

    it("should reject an empty feed list and an unknown provider", () => {
      const configPath = writeConfig(
        "bad.yaml",
        validYaml.replace("anthropic", "invalid_provider").replace("  - https://example.com/rss", "  []"),
      );

      expect(() => loadConfig(configPath, secrets)).toThrow(/llm\.provider/);
      expect(() => loadConfig(configPath, secrets)).toThrow(/ {2}- feeds: /);
    });

    it("should report a missing file and malformed YAML", () => {
      expect(() => loadConfig(join(tmpDir, "missing.yaml"), secrets)).toThrow(
        "failed to read config file",
      );
      expect(() => loadConfig(writeConfig("broken.yaml", "llm: [unclosed"), secrets)).toThrow(
        "failed to parse YAML",
      );
    });

    it("should reject a document that is not a mapping", () => {
      const configPath = writeConfig("list.yaml", "- one\n- two\n");

      expect(() => loadConfig(configPath, secrets)).toThrow("expected a mapping");
    });
  });

  describe("database", () => {
    it("should create the parent directory and keep rows across reopen", () => {
      const dbPath = join(tmpDir, "nested", "newsgate.db");

      const first = createDatabase(dbPath);
      insertArticleBase(first.db, { url: "https://example.com/a", title: "A", content: "x" });
      first.close();

      expect(existsSync(dbPath)).toBe(true);
      const second = createDatabase(dbPath);
      expect(articleExists(second.db, "https://example.com/a")).toBe(true);
      second.close();
    });
  });

  describe("structured log output", () => {
    it("should produce JSON logs with level label, time, service and msg", () => {
      const chunks: Array<string> = [];
      const stream = new Writable({
        write(chunk: Buffer, _encoding: string, callback: () => void) {
          chunks.push(chunk.toString("utf-8"));
          callback();
        },
      });

      const logger = createLogger("info", stream);
      logger.info({ feeds: 2 }, "config loaded");
      logger.debug("hidden at info");

      expect(chunks).toHaveLength(1);
      const record: unknown = JSON.parse(chunks[0] ?? "");
      expect(record).toMatchObject({
        level: "info",
        service: "newsgate",
        feeds: 2,
        msg: "config loaded",
      });
      expect(record).toHaveProperty("time", expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
    });
  });
});
