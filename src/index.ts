import { resolve } from "node:path";
import type { Server } from "node:http";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { createLlmClient } from "./llm/client";
import { createLlmTransformer } from "./pipeline/transformer";
import { runTick } from "./pipeline/orchestrator";
import { createTelegraphPublisher } from "./publish/telegraph";
import { createTelegramClient } from "./moderation/telegram";
import { createModerationGateway } from "./moderation/gateway";
import { createModerationListener } from "./moderation/listener";
import { createSocialWebhook } from "./moderation/webhook";
import { createPollScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/newsgate.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger(process.env["LOG_LEVEL"]);

  logger.info("newsgate starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model, feeds: config.feeds.length },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));
  logger.info("database ready");

  const model = createLlmClient(config);
  const transformer = createLlmTransformer(model, config, logger);
  logger.info(
    { provider: config.llm.provider, model: config.llm.model },
    "llm client initialised",
  );

  const telegram = createTelegramClient(config.secrets.telegramBotToken);
  const publisher = createTelegraphPublisher(
    config.secrets.telegraphAccessToken,
    config.hosting.authorName,
    logger,
  );

  const webhook = config.webhook.url
    ? createSocialWebhook({
        url: config.webhook.url,
        timeoutMs: config.webhook.timeoutMs,
        transformer,
        logger,
      })
    : null;
  if (!webhook) {
    logger.info("webhook url not set, social webhook disabled");
  }

  const moderation = createModerationGateway({ db, telegram, config, logger, webhook });
  const listener = createModerationListener(telegram, moderation, logger);
  await listener.start();

  const pollScheduler = createPollScheduler(
    () => runTick({ db, config, logger, transformer, publisher, moderation }),
    config,
    logger,
  );
  logger.info(
    { pollIntervalSeconds: config.ingest.pollIntervalSeconds },
    "poll scheduler started",
  );

  const app = createApiServer({
    db,
    config,
    logger,
    moderation,
    scheduler: pollScheduler,
  });
  const server: Server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  registerShutdownHandlers({
    services: [
      { name: "poll scheduler", stop: pollScheduler.stop },
      { name: "moderation listener", stop: listener.stop },
      {
        name: "api server",
        stop: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((err) => (err ? rejectClose(err) : resolveClose()));
          }),
      },
    ],
    closeDb,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
