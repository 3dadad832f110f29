// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig, ChatId, ModerationLabels } from "../config";
import { getArticleById } from "../pipeline/dedup";
import { escapeHtml, escapeText } from "../pipeline/markup";
import { isStaleQueryError } from "./telegram";
import type { TelegramClient, TelegramMessage } from "./telegram";
import type { SocialWebhook, WebhookResult } from "./webhook";

export const APPROVAL_PREFIX = "pub_";

export function encodeApprovalPayload(articleId: number): string {
  return `${APPROVAL_PREFIX}${articleId}`;
}

/**
 * @returns The article id, or `null` unless the payload is `pub_<positive integer>`.
 */
export function parseApprovalPayload(data: string): number | null {
  const match = /^pub_(\d+)$/.exec(data);
  if (!match?.[1]) return null;
  const id = Number(match[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export type DraftParams = {
  /** Already HTML: the headline with its link to the hosted page. */
  readonly title: string;
  readonly shortDescription: string;
  readonly sourceUrl: string;
  readonly articleId: number;
};

export function formatDraft(params: DraftParams, sourceLabel: string): string {
  return [
    `<b>${params.title}</b>`,
    escapeText(params.shortDescription),
    `<a href="${escapeHtml(params.sourceUrl)}">${escapeText(sourceLabel)}</a>`,
  ].join("\n\n");
}

/**
 * Drops the last line that holds the source link and trims what is left.
 */
export function stripSourceLine(html: string, sourceLabel: string): string {
  const lines = html.split("\n");
  const anchorEnd = `>${escapeText(sourceLabel)}</a>`;
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? "";
    if (line.includes("<a href=") && line.includes(anchorEnd)) {
      lines.splice(i, 1);
      break;
    }
  }
  return lines.join("\n").trim();
}

/**
 * Public link to a channel post: `t.me/<username>/<id>` for public chats,
 * `t.me/c/<internal id>/<id>` for `-100…` ids. `null` when neither applies.
 */
export function buildPostPermalink(
  chatId: ChatId,
  messageId: number,
  username?: string,
): string | null {
  if (username) return `https://t.me/${username}/${messageId}`;

  const raw = String(chatId);
  if (raw.startsWith("@")) return `https://t.me/${raw.slice(1)}/${messageId}`;
  if (/^-100\d+$/.test(raw)) return `https://t.me/c/${raw.slice(4)}/${messageId}`;
  return null;
}

/**
 * An operator pressed the approval button under a draft.
 */
export type ApprovalEvent = {
  readonly callbackQueryId: string;
  readonly data: string;
  readonly chatId: number;
  readonly messageId: number;
  /** The draft as HTML, rebuilt from the received message. */
  readonly draftHtml: string;
};

export type ApprovalOutcome =
  | {
      readonly status: "published";
      readonly articleId: number;
      readonly publicMessageId: number;
      readonly permalink: string | null;
      /** Detached side effect; resolves, never rejects. */
      readonly webhook: Promise<WebhookResult> | null;
    }
  | { readonly status: "invalid_id" }
  | { readonly status: "not_found"; readonly articleId: number }
  | { readonly status: "publish_failed"; readonly articleId: number; readonly error: string }
  | { readonly status: "unacknowledged"; readonly error: string };

export type ModerationSubmitter = {
  readonly submit: (params: DraftParams) => Promise<void>;
};

export type ModerationGateway = ModerationSubmitter & {
  readonly handleApproval: (event: ApprovalEvent) => Promise<ApprovalOutcome>;
};

export type ModerationGatewayDeps = {
  readonly db: AppDatabase;
  readonly telegram: TelegramClient;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly webhook: SocialWebhook | null;
};

/**
 * Review/publish protocol. Drafts go to the review chat with one approval
 * button; the button's payload is the only link back to the article, and the
 * store is the only state shared with the ingestion side.
 *
 * A repeated approval for the same article publishes again: nothing records
 * that a draft was already approved.
 */
export function createModerationGateway(deps: ModerationGatewayDeps): ModerationGateway {
  const { db, telegram, config, logger } = deps;
  const labels: ModerationLabels = config.moderation.labels;
  const { reviewChatId, publicChatId } = config.telegram;

  async function annotate(event: ApprovalEvent, suffix: string): Promise<void> {
    try {
      await telegram.editMessageText({
        chatId: event.chatId,
        messageId: event.messageId,
        text: `${event.draftHtml}\n\n${suffix}`,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { messageId: event.messageId, error: message },
        "could not annotate review draft",
      );
    }
  }

  return {
    async submit(params) {
      await telegram.sendMessage({
        chatId: reviewChatId,
        text: formatDraft(params, labels.source),
        replyMarkup: {
          inline_keyboard: [
            [
              {
                text: labels.publishButton,
                callback_data: encodeApprovalPayload(params.articleId),
              },
            ],
          ],
        },
      });
      logger.info({ articleId: params.articleId }, "draft sent for moderation");
    },

    async handleApproval(event) {
      try {
        await telegram.answerCallbackQuery(event.callbackQueryId);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (!isStaleQueryError(err)) {
          logger.error({ error: message }, "could not acknowledge approval");
          return { status: "unacknowledged", error: message };
        }
        logger.warn({ error: message }, "approval query is stale, publishing anyway");
      }

      const articleId = parseApprovalPayload(event.data);
      if (articleId === null) {
        logger.warn({ data: event.data }, "approval payload has no valid article id");
        await annotate(event, `<b>${escapeText(labels.invalidId)}</b>`);
        return { status: "invalid_id" };
      }

      const article = getArticleById(db, articleId);
      if (!article || !article.hostedUrl) {
        logger.warn({ articleId }, "approved article not found or not hosted");
        await annotate(event, `<b>${escapeText(labels.notFound)}</b>`);
        return { status: "not_found", articleId };
      }

      let publicMessage: TelegramMessage;
      try {
        publicMessage = await telegram.sendMessage({
          chatId: publicChatId,
          text: stripSourceLine(event.draftHtml, labels.source),
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ articleId, error: message }, "public post failed");
        await annotate(
          event,
          `<b>${escapeText(labels.publishFailed)}</b> ${escapeText(message)}`,
        );
        return { status: "publish_failed", articleId, error: message };
      }

      logger.info(
        { articleId, hostedUrl: article.hostedUrl, messageId: publicMessage.message_id },
        "article published",
      );
      await annotate(event, `<b>${escapeText(labels.published)}</b>`);

      const permalink = buildPostPermalink(
        publicChatId,
        publicMessage.message_id,
        publicMessage.chat.username,
      );

      let webhook: Promise<WebhookResult> | null = null;
      if (deps.webhook && permalink && article.translatedContent) {
        webhook = deps.webhook.deliver({
          articleId,
          content: article.translatedContent,
          postUrl: permalink,
          imageUrl: article.imageUrl,
        });
      } else if (deps.webhook) {
        logger.warn({ articleId, permalink }, "social webhook skipped, nothing to announce");
      }

      return {
        status: "published",
        articleId,
        publicMessageId: publicMessage.message_id,
        permalink,
        webhook,
      };
    },
  };
}
