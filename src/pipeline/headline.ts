import { z } from "zod/v3";
import { escapeHtml, escapeText, trimTrailingPunctuation } from "./markup";

export const headlineOutputSchema = z.object({
  title: z.string().describe("Short headline in the target language, no trailing punctuation"),
  description: z
    .string()
    .describe("One or two sentence teaser in the target language, plain text"),
  linkPhrase: z
    .string()
    .describe("A few consecutive words copied exactly from the title to carry the article link")
    .default(""),
});

export type Headline = z.infer<typeof headlineOutputSchema>;

export function cleanHeadline(raw: Headline): Headline {
  return {
    title: trimTrailingPunctuation(raw.title),
    description: trimTrailingPunctuation(raw.description),
    linkPhrase: raw.linkPhrase.trim(),
  };
}

/**
 * HTML headline for the review draft: the escaped title with the first
 * occurrence of the link phrase pointing at the hosted page. Without a
 * usable phrase the whole title becomes the link.
 */
export function renderHeadlineHtml(headline: Headline, hostedUrl: string): string {
  const href = escapeHtml(hostedUrl);
  const phrase = headline.linkPhrase;
  const at = phrase === "" ? -1 : headline.title.indexOf(phrase);

  if (at < 0) {
    return `<a href="${href}">${escapeText(headline.title)}</a>`;
  }

  const before = headline.title.slice(0, at);
  const after = headline.title.slice(at + phrase.length);
  return `${escapeText(before)}<a href="${href}">${escapeText(phrase)}</a>${escapeText(after)}`;
}
