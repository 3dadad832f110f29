// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ContentTransformer } from "../pipeline/transformer";

export type SocialWebhookPayload = {
  readonly generatedPostText: string;
  readonly telegramPostUrl: string;
  readonly imageUrl?: string;
};

export type WebhookResult =
  | { readonly success: true; readonly status: number }
  | { readonly success: false; readonly error: string };

export type SocialPostRequest = {
  readonly articleId: number;
  readonly content: string;
  readonly postUrl: string;
  readonly imageUrl: string | null;
};

/**
 * Best-effort side channel that announces a published post to an automation
 * endpoint. `deliver` never throws.
 */
export type SocialWebhook = {
  readonly deliver: (request: SocialPostRequest) => Promise<WebhookResult>;
};

export type SocialWebhookOptions = {
  readonly url: string;
  readonly timeoutMs: number;
  readonly transformer: Pick<ContentTransformer, "composeSocialPost">;
  readonly logger: Logger;
};

function timedOut(signal: AbortSignal, timeoutMs: number): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener(
      "abort",
      () => reject(new Error(`social webhook timed out after ${timeoutMs}ms`)),
      { once: true },
    );
  });
}

/**
 * `timeoutMs` bounds the whole delivery, post composition included.
 */
export function createSocialWebhook(options: SocialWebhookOptions): SocialWebhook {
  const { url, timeoutMs, transformer, logger } = options;

  async function send(request: SocialPostRequest, signal: AbortSignal): Promise<number> {
    const generatedPostText = await transformer.composeSocialPost(request.content, signal);
    const payload: SocialWebhookPayload = {
      generatedPostText,
      telegramPostUrl: request.postUrl,
      ...(request.imageUrl !== null && { imageUrl: request.imageUrl }),
    };

    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
    return response.status;
  }

  return {
    async deliver(request) {
      const signal = AbortSignal.timeout(timeoutMs);
      try {
        const status = await Promise.race([
          send(request, signal),
          timedOut(signal, timeoutMs),
        ]);
        logger.info({ articleId: request.articleId, status }, "social webhook delivered");
        return { success: true, status };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(
          { articleId: request.articleId, error: message },
          "social webhook failed",
        );
        return { success: false, error: message };
      }
    },
  };
}
