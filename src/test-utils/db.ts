import pino from "pino";
import type { z } from "zod/v3";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { articles } from "../db/schema";
import type { NewArticle } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { DraftParams, ModerationSubmitter } from "../moderation/gateway";
import type { AppContext } from "../api/context";

/**
 * Creates an in-memory SQLite test database with the articles table in place.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

/**
 * Seeds a test article with optional field overrides.
 * @returns The ID of the inserted article.
 */
export function seedTestArticle(
  db: AppDatabase,
  overrides?: Partial<NewArticle>,
): number {
  const result = db
    .insert(articles)
    .values({
      originalUrl: `https://example.com/news/${Date.now()}-${Math.random()}`,
      title: "Test Article",
      originalContent: "<p>Original body of the test article.</p>",
      ...overrides,
    })
    .returning({ id: articles.id })
    .get();

  return result.id;
}

type ConfigInput = z.input<typeof appConfigSchema>;

/**
 * A complete AppConfig with schema defaults applied and placeholder secrets.
 * Top-level sections in `overrides` replace the defaults wholesale.
 */
export function createTestConfig(overrides?: Partial<ConfigInput>): AppConfig {
  return appConfigSchema.parse({
    llm: { provider: "anthropic", model: "claude-test" },
    feeds: ["https://example.com/rss"],
    telegram: { reviewChatId: -1001111111111, publicChatId: "@newsgate_test" },
    ingest: { interCandidateDelayMs: 0 },
    secrets: {
      telegramBotToken: "test-secret",
      telegraphAccessToken: "test-secret",
      llmApiKey: "test-secret",
    },
    ...overrides,
  });
}

/**
 * Submitter that records every draft instead of sending it.
 */
export function createRecordingSubmitter(): ModerationSubmitter & {
  readonly drafts: Array<DraftParams>;
} {
  const drafts: Array<DraftParams> = [];
  return {
    drafts,
    submit: async (params) => {
      drafts.push(params);
    },
  };
}

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 */
export function createTestCaller(
  db: AppDatabase,
  options?: {
    readonly config?: AppConfig;
    readonly moderation?: ModerationSubmitter;
    readonly scheduler?: AppContext["scheduler"];
  },
) {
  const createCaller = createCallerFactory(appRouter);
  const config = options?.config ?? createTestConfig();
  const moderation = options?.moderation ?? createRecordingSubmitter();
  const scheduler = options?.scheduler ?? {
    trigger: async () => true,
    isRunning: () => false,
  };
  const logger = pino({ level: "silent" });

  return createCaller({ db, config, logger, moderation, scheduler });
}
