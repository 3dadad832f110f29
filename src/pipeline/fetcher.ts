import type { Logger } from "pino";

export type FetchResult =
  | { success: true; html: string; url: string }
  | { success: false; error: string; url: string };

/**
 * Sites that block bots serve real pages to this identity.
 */
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

/**
 * Fetches article HTML with a timeout. A failure is final for this tick only:
 * nothing is stored, so the next tick tries the URL again.
 */
export async function fetchArticle(
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<FetchResult> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": BROWSER_USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
    });

    if (!response.ok) {
      logger.warn({ url, status: response.status }, "article fetch rejected");
      return {
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        url,
      };
    }

    const html = await response.text();
    logger.debug({ url, length: html.length }, "article fetched");
    return { success: true, html, url };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url, error: message }, "article fetch failed");
    return { success: false, error: message, url };
  }
}
