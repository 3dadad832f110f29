// pattern: functional-core
import * as cheerio from "cheerio";

/**
 * Substrings that mark an image as chrome rather than article content.
 */
export const IMAGE_DENYLIST: ReadonlyArray<string> = [
  "logo",
  "avatar",
  "icon",
  "spinner",
  ".gif",
  "data:image",
  "placeholder",
];

export const DESCRIPTION_MAX_LENGTH = 300;

const TRAILING_PUNCTUATION = /[\s.,;:!?\-–—]+$/u;

/**
 * Strips trailing punctuation and surrounding whitespace. Applying it to its
 * own output returns the same string.
 */
export function trimTrailingPunctuation(value: string): string {
  return value.trim().replace(TRAILING_PUNCTUATION, "").trim();
}

/**
 * Escapes text content. Use `escapeHtml` for attribute values.
 */
export function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function isAcceptedImage(src: string): boolean {
  const lower = src.toLowerCase();
  return !IMAGE_DENYLIST.some((marker) => lower.includes(marker));
}

/**
 * Cuts a paragraph down to a teaser. Truncated text gets an ellipsis after
 * its trailing punctuation is removed.
 */
export function toShortDescription(text: string): string {
  // Code points, so a surrogate pair is never split.
  const chars = Array.from(text);
  const truncated = chars.length > DESCRIPTION_MAX_LENGTH;
  const head = truncated ? chars.slice(0, DESCRIPTION_MAX_LENGTH).join("") : text;
  return trimTrailingPunctuation(head) + (truncated ? "..." : "");
}

const WRAPPER_TAGS = [
  "div",
  "span",
  "section",
  "article",
  "header",
  "footer",
  "nav",
  "aside",
  "main",
  "figure",
  "figcaption",
  "picture",
  "source",
];

const BARE_TAGS = "p|h3|h4|strong|em|b|i|u|s|code|pre|blockquote|br|ul|ol|li";

/**
 * Brings arbitrary article HTML into the shape the hosting service accepts:
 * no document wrappers, headings collapsed to h3/h4, layout tags unwrapped,
 * attributes dropped except `img[src]` and `a[href]`, empty paragraphs and
 * runs of whitespace removed. Idempotent.
 */
export function normalizeMarkup(html: string): string {
  let out = html;

  out = out.replace(/<!doctype[^>]*>/gi, "");
  out = out.replace(/<!--[\s\S]*?-->/g, "");
  out = out.replace(/<\/?(html|head|body)(\s[^>]*)?>/gi, "");

  out = out.replace(/<h[12](\s[^>]*)?>/gi, "<h3>");
  out = out.replace(/<\/h[12]>/gi, "</h3>");
  out = out.replace(/<h[56](\s[^>]*)?>/gi, "<h4>");
  out = out.replace(/<\/h[56]>/gi, "</h4>");

  for (const tag of WRAPPER_TAGS) {
    out = out.replace(new RegExp(`<${tag}(\\s[^>]*)?/?>`, "gi"), "");
    out = out.replace(new RegExp(`</${tag}>`, "gi"), "");
  }

  out = out.replace(
    new RegExp(`<(${BARE_TAGS})\\s[^>]*?(/?)>`, "gi"),
    (_match: string, tag: string, selfClose: string) =>
      `<${tag.toLowerCase()}${selfClose}>`,
  );
  out = out.replace(/<img\b[^>]*?\bsrc="([^"]*)"[^>]*>/gi, '<img src="$1">');
  out = out.replace(/<img\b(?![^>]*\bsrc=")[^>]*>/gi, "");
  out = out.replace(/<a\b[^>]*?\bhref="([^"]*)"[^>]*>/gi, '<a href="$1">');

  out = out.replace(/<p>(\s|&nbsp;)*<\/p>/gi, "");
  out = out.replace(/\s+/g, " ");
  out = out.replace(
    /\s*(<\/?(?:p|h3|h4|blockquote|pre|ul|ol|li|br\/?)>|<img src="[^"]*">)\s*/g,
    "$1",
  );

  return out.trim();
}

/**
 * First paragraph of plain text longer than 50 characters, as a teaser.
 * Entities are decoded, so the result is plain text like `.text()` gives.
 */
export function findDescriptionInMarkup(html: string): string {
  for (const match of html.matchAll(/<p>([^<]+)<\/p>/g)) {
    const text = cheerio.load(match[1] ?? "", null, false).text().trim();
    if (text.length > 50) {
      return toShortDescription(text);
    }
  }
  return "";
}

/**
 * First image in normalized markup, unless it is on the denylist.
 */
export function findImageInMarkup(html: string): string | null {
  const match = /<img src="([^"]+)"/.exec(html);
  const src = match?.[1];
  if (src === undefined || !isAcceptedImage(src)) return null;
  return src;
}
