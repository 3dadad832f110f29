import { z } from "zod/v3";

const chatIdSchema = z.union([z.string().min(1), z.number().int()]);

const llmProviderSchema = z.enum([
  "anthropic",
  "openai",
  "gemini",
  "ollama",
  "lmstudio",
]);

export type LlmProvider = z.infer<typeof llmProviderSchema>;

const LOCAL_PROVIDERS: ReadonlyArray<LlmProvider> = ["ollama", "lmstudio"];

const labelsSchema = z
  .object({
    publishButton: z.string().min(1).default("Publish"),
    source: z.string().min(1).default("Source"),
    published: z.string().min(1).default("✅ Published"),
    notFound: z.string().min(1).default("❌ Error: article not found"),
    invalidId: z.string().min(1).default("❌ Error: invalid article id"),
    publishFailed: z.string().min(1).default("❌ Publishing failed:"),
  })
  .default({});

export const appConfigSchema = z
  .object({
    llm: z.object({
      provider: llmProviderSchema,
      model: z.string().min(1),
    }),
    feeds: z.array(z.string().url()).min(1),
    telegram: z.object({
      reviewChatId: chatIdSchema,
      publicChatId: chatIdSchema,
    }),
    ingest: z
      .object({
        articlesPerFeed: z.number().int().min(1).max(10).default(5),
        pollIntervalSeconds: z.number().int().min(10).max(3600).default(300),
        interCandidateDelayMs: z.number().int().nonnegative().default(5000),
        fetchTimeoutMs: z.number().int().positive().default(15000),
      })
      .default({}),
    transform: z
      .object({
        language: z.string().min(1).default("English"),
        comparisonLimit: z.number().int().positive().default(5),
        maxArticleLength: z.number().int().positive().default(4000),
        fallbackTitle: z.string().min(1).default("News"),
        fallbackDescription: z.string().min(1).default("An interesting read"),
      })
      .default({}),
    hosting: z
      .object({
        authorName: z.string().min(1).default("newsgate"),
      })
      .default({}),
    moderation: z
      .object({
        labels: labelsSchema,
      })
      .default({}),
    webhook: z
      .object({
        url: z.string().url().optional(),
        timeoutMs: z.number().int().positive().default(10000),
      })
      .default({}),
    secrets: z.object({
      telegramBotToken: z
        .string({ required_error: "TELEGRAM_BOT_TOKEN is required" })
        .min(1, "TELEGRAM_BOT_TOKEN is required"),
      telegraphAccessToken: z
        .string({ required_error: "TELEGRAPH_ACCESS_TOKEN is required" })
        .min(1, "TELEGRAPH_ACCESS_TOKEN is required"),
      llmApiKey: z.string().min(1).optional(),
    }),
  })
  .superRefine((config, ctx) => {
    if (
      !LOCAL_PROVIDERS.includes(config.llm.provider) &&
      config.secrets.llmApiKey === undefined
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["secrets", "llmApiKey"],
        message: `LLM_API_KEY is required for provider ${config.llm.provider}`,
      });
    }
  });

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ModerationLabels = AppConfig["moderation"]["labels"];
export type ChatId = AppConfig["telegram"]["reviewChatId"];
