import type { Logger } from "pino";
import { fetchArticle } from "./fetcher";
import { extractStructured } from "./extractor";
import { extractWithReadability } from "./readability";
import type { ExtractionResult } from "./types";

export type ArticleExtraction =
  | { readonly success: true; readonly result: ExtractionResult }
  | {
      readonly success: false;
      readonly reason: "transport" | "empty";
      readonly error: string;
    };

/**
 * Runs both strategies over already fetched HTML: structural first, Readability
 * only when the structural pass comes back empty.
 */
export function extractFromHtml(
  html: string,
  url: string,
  logger: Logger,
): ExtractionResult | null {
  const structured = extractStructured(html);
  if (structured) {
    logger.debug(
      { url, length: structured.contentHtml.length },
      "structural extraction succeeded",
    );
    return structured;
  }

  logger.info({ url }, "structural extraction empty, trying readability");
  const fallback = extractWithReadability(html);
  if (fallback) {
    logger.debug(
      { url, length: fallback.contentHtml.length },
      "readability extraction succeeded",
    );
  }
  return fallback;
}

/**
 * Fetches a page and extracts its article. Never throws; a failed result means
 * the candidate is skipped for this tick and stays eligible for the next one.
 */
export async function extractArticle(
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<ArticleExtraction> {
  const fetched = await fetchArticle(url, timeoutMs, logger);
  if (!fetched.success) {
    return { success: false, reason: "transport", error: fetched.error };
  }

  try {
    const result = extractFromHtml(fetched.html, url, logger);
    if (!result) {
      logger.warn({ url }, "both extraction strategies returned no content");
      return {
        success: false,
        reason: "empty",
        error: "no content extracted",
      };
    }
    return { success: true, result };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ url, error: message }, "extraction threw");
    return { success: false, reason: "empty", error: message };
  }
}
