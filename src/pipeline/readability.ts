// pattern: functional-core
import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import type { ExtractionResult } from "./types";
import {
  findDescriptionInMarkup,
  findImageInMarkup,
  normalizeMarkup,
  trimTrailingPunctuation,
} from "./markup";
import { UNTITLED } from "./extractor";

/**
 * Fallback extraction with Mozilla Readability (Firefox Reader View). Its
 * HTML goes through the same normalization as everything else, and the
 * teaser and image are read back out of the normalized markup.
 *
 * @returns `null` when Readability finds no article or only empty markup.
 */
export function extractWithReadability(html: string): ExtractionResult | null {
  const { document } = parseHTML(html);
  const article = new Readability(document, { charThreshold: 100 }).parse();

  const rawContent = article?.content ?? "";
  const contentHtml = normalizeMarkup(rawContent);
  if (contentHtml === "" || contentHtml.replace(/<[^>]+>/g, "").trim() === "") {
    return null;
  }

  const title = trimTrailingPunctuation(article?.title ?? "");

  return {
    title: title || UNTITLED,
    contentHtml,
    imageUrl: findImageInMarkup(contentHtml),
    shortDescription: findDescriptionInMarkup(contentHtml),
    strategy: "readability",
  };
}
