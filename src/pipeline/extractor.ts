// pattern: functional-core
import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import type { ExtractionResult } from "./types";
import {
  escapeHtml,
  escapeText,
  isAcceptedImage,
  toShortDescription,
  trimTrailingPunctuation,
} from "./markup";

/**
 * Content containers in order of preference. `body` is the last resort.
 */
export const CONTAINER_SELECTORS: ReadonlyArray<string> = [
  "article",
  "div.post-content",
  "div#article-body",
  "div.article-body",
  "div.entry-content",
  "div.td-post-content",
  "main",
];

const NON_CONTENT_SELECTOR =
  "script, style, noscript, nav, footer, aside, form, iframe, header";

/**
 * Class substrings of page chrome. Matched anywhere in the class attribute,
 * so "ad" also removes "header-ad" and "badge".
 */
export const CLASS_DENYLIST: ReadonlyArray<string> = [
  "social",
  "share",
  "button",
  "ad",
  "promo",
  "sidebar",
  "comment",
  "related",
  "subscribe",
];

export const MIN_PARAGRAPH_LENGTH = 20;
export const MIN_HEADING_LENGTH = 3;

export const UNTITLED = "No Title Found";

function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function pageTitle($: cheerio.CheerioAPI): string {
  const heading = normalizeText($("h1").first().text());
  const fallback = normalizeText($("title").first().text());
  const title = trimTrailingPunctuation(heading || fallback);
  return title || UNTITLED;
}

/**
 * Structural extraction: pick the best content container, strip chrome, then
 * rebuild the body from paragraphs, headings and images in document order.
 *
 * @returns `null` when nothing usable is left, so the caller can fall back.
 */
export function extractStructured(html: string): ExtractionResult | null {
  const $ = cheerio.load(html);
  const title = pageTitle($);

  let container: cheerio.Cheerio<AnyNode> = $("body").first();
  for (const selector of CONTAINER_SELECTORS) {
    const match = $(selector).first();
    if (match.length > 0) {
      container = match;
      break;
    }
  }
  if (container.length === 0) return null;

  container.find(NON_CONTENT_SELECTOR).remove();
  for (const marker of CLASS_DENYLIST) {
    container.find(`[class*="${marker}"]`).remove();
  }

  const blocks: Array<string> = [];
  const seenImages = new Set<string>();
  let shortDescription = "";
  let imageUrl: string | null = null;

  container.find("p, h1, h2, h3, img, figure").each((_, el) => {
    const tag = el.tagName.toLowerCase();

    if (tag === "p" || tag === "h1" || tag === "h2" || tag === "h3") {
      const text = normalizeText($(el).text());
      const minLength = tag === "p" ? MIN_PARAGRAPH_LENGTH : MIN_HEADING_LENGTH;
      if (text.length < minLength) return;

      if (tag === "p") {
        if (shortDescription === "") {
          shortDescription = toShortDescription(text);
        }
        blocks.push(`<p>${escapeText(text)}</p>`);
      } else {
        blocks.push(`<h3>${escapeText(text)}</h3>`);
      }
      return;
    }

    const img = tag === "img" ? $(el) : $(el).find("img").first();
    if (img.length === 0) return;

    const src = (img.attr("src") || img.attr("data-src") || "").trim();
    if (!src.startsWith("http") || seenImages.has(src) || !isAcceptedImage(src)) {
      return;
    }

    seenImages.add(src);
    blocks.push(`<img src="${escapeHtml(src)}">`);
    if (imageUrl === null) {
      imageUrl = src;
    }
  });

  if (blocks.length === 0) return null;

  return {
    title,
    contentHtml: blocks.join(""),
    imageUrl,
    shortDescription,
    strategy: "structural",
  };
}
