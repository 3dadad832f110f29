// pattern: Imperative Shell
import { z } from "zod/v3";
import type { ChatId } from "../config";

/**
 * Typed wrappers for the handful of Bot API methods the moderation flow uses:
 * sendMessage, editMessageText, answerCallbackQuery, getUpdates, deleteWebhook.
 */

const entitySchema = z.object({
  type: z.string(),
  offset: z.number().int(),
  length: z.number().int(),
  url: z.string().optional(),
  language: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({
    id: z.number(),
    type: z.string(),
    username: z.string().optional(),
  }),
  date: z.number(),
  text: z.string().optional(),
  entities: z.array(entitySchema).optional(),
});

const callbackQuerySchema = z.object({
  id: z.string(),
  from: z.object({ id: z.number(), username: z.string().optional() }),
  message: messageSchema.optional(),
  data: z.string().optional(),
});

const updateSchema = z.object({
  update_id: z.number().int(),
  callback_query: callbackQuerySchema.optional(),
});

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
});

export type TelegramEntity = z.infer<typeof entitySchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramCallbackQuery = z.infer<typeof callbackQuerySchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;

export type InlineKeyboardMarkup = {
  readonly inline_keyboard: ReadonlyArray<
    ReadonlyArray<{ readonly text: string; readonly callback_data: string }>
  >;
};

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly errorCode: number | null,
    description: string,
  ) {
    super(`${method} failed: ${description}`);
    this.name = "TelegramApiError";
  }
}

export type SendMessageParams = {
  readonly chatId: ChatId;
  readonly text: string;
  readonly replyMarkup?: InlineKeyboardMarkup;
};

export type EditMessageParams = {
  readonly chatId: ChatId;
  readonly messageId: number;
  readonly text: string;
};

export type GetUpdatesParams = {
  readonly offset?: number;
  readonly timeoutSeconds: number;
  readonly signal?: AbortSignal;
};

export type TelegramClient = {
  readonly sendMessage: (params: SendMessageParams) => Promise<TelegramMessage>;
  readonly editMessageText: (params: EditMessageParams) => Promise<void>;
  readonly answerCallbackQuery: (callbackQueryId: string) => Promise<void>;
  readonly getUpdates: (params: GetUpdatesParams) => Promise<Array<TelegramUpdate>>;
  readonly deleteWebhook: () => Promise<boolean>;
};

const REQUEST_TIMEOUT_MS = 15000;

/**
 * Creates a Bot API client bound to one token. Every call throws
 * `TelegramApiError` when the API answers `ok: false`.
 *
 * @param token - Bot token from BotFather
 * @param baseUrl - API root, replaceable in tests
 */
export function createTelegramClient(
  token: string,
  baseUrl = "https://api.telegram.org",
): TelegramClient {
  async function call(
    method: string,
    body: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<unknown> {
    const resp = await fetch(`${baseUrl}/bot${token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });

    const envelope = envelopeSchema.safeParse(await resp.json());
    if (!envelope.success) {
      throw new TelegramApiError(method, resp.status, "malformed response");
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(
        method,
        envelope.data.error_code ?? resp.status,
        envelope.data.description ?? "unknown error",
      );
    }
    return envelope.data.result;
  }

  const timeout = () => AbortSignal.timeout(REQUEST_TIMEOUT_MS);

  return {
    async sendMessage({ chatId, text, replyMarkup }) {
      const result = await call(
        "sendMessage",
        {
          chat_id: chatId,
          text,
          parse_mode: "HTML",
          link_preview_options: { is_disabled: false },
          ...(replyMarkup && { reply_markup: replyMarkup }),
        },
        timeout(),
      );
      return messageSchema.parse(result);
    },

    async editMessageText({ chatId, messageId, text }) {
      await call(
        "editMessageText",
        { chat_id: chatId, message_id: messageId, text, parse_mode: "HTML" },
        timeout(),
      );
    },

    async answerCallbackQuery(callbackQueryId) {
      await call("answerCallbackQuery", { callback_query_id: callbackQueryId }, timeout());
    },

    async getUpdates({ offset, timeoutSeconds, signal }) {
      const requestTimeout = AbortSignal.timeout((timeoutSeconds + 10) * 1000);
      const result = await call(
        "getUpdates",
        {
          ...(offset !== undefined && { offset }),
          timeout: timeoutSeconds,
          allowed_updates: ["callback_query"],
        },
        signal ? AbortSignal.any([signal, requestTimeout]) : requestTimeout,
      );
      return z.array(updateSchema).parse(result);
    },

    async deleteWebhook() {
      const result = await call("deleteWebhook", {}, timeout());
      return result === true;
    },
  };
}

/**
 * True for callback-query errors that only mean the button press is too old
 * to acknowledge; the press itself is still valid.
 */
export function isStaleQueryError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return /too old|timeout expired|query id is invalid/i.test(message);
}
