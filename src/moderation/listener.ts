// pattern: Imperative Shell
import type { Logger } from "pino";
import { renderMessageHtml } from "./entities";
import { APPROVAL_PREFIX } from "./gateway";
import type { ApprovalEvent, ModerationGateway } from "./gateway";
import type { TelegramCallbackQuery, TelegramClient } from "./telegram";

export type ModerationListener = {
  readonly start: () => Promise<void>;
  readonly stop: () => Promise<void>;
};

export type ModerationListenerOptions = {
  readonly longPollSeconds?: number;
  readonly retryDelayMs?: number;
};

/**
 * Turns a button press into an approval event. `null` for presses that are
 * not approvals or whose draft message is no longer available.
 */
export function toApprovalEvent(query: TelegramCallbackQuery): ApprovalEvent | null {
  if (!query.data?.startsWith(APPROVAL_PREFIX) || !query.message) {
    return null;
  }
  return {
    callbackQueryId: query.id,
    data: query.data,
    chatId: query.message.chat.id,
    messageId: query.message.message_id,
    draftHtml: renderMessageHtml(query.message.text ?? "", query.message.entities),
  };
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true },
    );
  });
}

/**
 * Long-polls the Bot API for approval presses and hands each one to the
 * gateway, one at a time. Runs beside the ingestion scheduler and shares
 * nothing with it but the database.
 */
export function createModerationListener(
  telegram: TelegramClient,
  gateway: Pick<ModerationGateway, "handleApproval">,
  logger: Logger,
  options: ModerationListenerOptions = {},
): ModerationListener {
  const longPollSeconds = options.longPollSeconds ?? 30;
  const retryDelayMs = options.retryDelayMs ?? 5000;
  const controller = new AbortController();
  let loop: Promise<void> | null = null;

  async function dispatch(query: TelegramCallbackQuery): Promise<void> {
    const event = toApprovalEvent(query);
    if (!event) {
      logger.debug({ data: query.data }, "ignoring callback query");
      // Still answered, or the operator's button keeps spinning.
      try {
        await telegram.answerCallbackQuery(query.id);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ data: query.data, error: message }, "could not answer ignored query");
      }
      return;
    }

    try {
      const outcome = await gateway.handleApproval(event);
      logger.info({ data: event.data, status: outcome.status }, "approval handled");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ data: event.data, error: message }, "approval handler failed");
    }
  }

  async function run(): Promise<void> {
    let offset: number | undefined;

    while (!controller.signal.aborted) {
      try {
        const updates = await telegram.getUpdates({
          offset,
          timeoutSeconds: longPollSeconds,
          signal: controller.signal,
        });

        for (const update of updates) {
          offset = update.update_id + 1;
          if (update.callback_query) {
            await dispatch(update.callback_query);
          }
        }
      } catch (err) {
        if (controller.signal.aborted) break;
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "getUpdates failed, retrying");
        await sleep(retryDelayMs, controller.signal);
      }
    }

    logger.info("moderation listener stopped");
  }

  return {
    async start() {
      if (loop) return;
      const removed = await telegram.deleteWebhook();
      logger.info({ webhookRemoved: removed }, "moderation listener starting");
      loop = run();
    },

    async stop() {
      controller.abort();
      if (loop) {
        await loop;
      }
    },
  };
}
