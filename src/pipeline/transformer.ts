// pattern: imperative-shell
import { generateText, Output } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { cleanHeadline, headlineOutputSchema } from "./headline";
import type { Headline } from "./headline";

/**
 * The language-model side of the pipeline. Every method except
 * `composeSocialPost` degrades to a pass-through instead of throwing.
 */
export type ContentTransformer = {
  readonly isUnique: (
    content: string,
    existing: ReadonlyArray<string>,
  ) => Promise<boolean>;
  readonly rewrite: (content: string) => Promise<string>;
  readonly synthesizeHeadline: (
    content: string,
    fallback: Pick<Headline, "title" | "description">,
  ) => Promise<Headline>;
  readonly composeSocialPost: (
    content: string,
    abortSignal?: AbortSignal,
  ) => Promise<string>;
};

const ALLOWED_TAGS = "<p>, <h3>, <h4>, <strong>, <em>, <blockquote>, <img src>";

function duplicateCheckPrompt(): string {
  return [
    "You compare news articles.",
    "Decide whether the NEW ARTICLE reports the same event or story as any of the EXISTING ARTICLES.",
    "Answer with exactly one word: DUPLICATE if it does, UNIQUE if it does not.",
  ].join(" ");
}

function rewritePrompt(language: string): string {
  return [
    `You are a news editor. Rewrite the article below in ${language}.`,
    "Keep every fact, figure, name and quote. Drop navigation leftovers, ads, calls to subscribe and unrelated links.",
    `Return only HTML using these tags: ${ALLOWED_TAGS}. Keep <img> tags where they were.`,
    "Do not wrap the answer in a code block.",
  ].join(" ");
}

function headlinePrompt(language: string): string {
  return [
    `Write a headline and a short teaser in ${language} for the article below.`,
    "The title must be at most 100 characters, the description one or two sentences of plain text.",
    "Neither may end with punctuation.",
    "linkPhrase must be two to five consecutive words copied exactly from the title.",
  ].join(" ");
}

function socialPostPrompt(language: string): string {
  return [
    `Write a social media post in ${language} announcing the article below.`,
    "Plain text, at most 280 characters, no hashtags, no links.",
  ].join(" ");
}

/**
 * Removes a markdown code fence the model sometimes puts around HTML.
 */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:html)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
}

export function createLlmTransformer(
  model: LanguageModel,
  config: AppConfig,
  logger: Logger,
): ContentTransformer {
  const { language, maxArticleLength } = config.transform;
  const clip = (text: string) => text.substring(0, maxArticleLength);

  return {
    async isUnique(content, existing) {
      if (existing.length === 0) return true;

      try {
        const { text } = await generateText({
          model,
          system: duplicateCheckPrompt(),
          prompt: `NEW ARTICLE:\n${clip(content)}\n\nEXISTING ARTICLES:\n${existing
            .map(clip)
            .join("\n\n---\n\n")}`,
        });
        const verdict = text.trim().toUpperCase();
        logger.debug({ verdict }, "duplicate check answered");
        return !verdict.includes("DUPLICATE");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ error: message }, "duplicate check failed, treating as unique");
        return true;
      }
    },

    async rewrite(content) {
      try {
        const { text } = await generateText({
          model,
          system: rewritePrompt(language),
          prompt: content,
        });
        const rewritten = stripCodeFence(text);
        if (rewritten === "") {
          logger.warn("rewrite returned nothing, keeping original content");
          return content;
        }
        return rewritten;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ error: message }, "rewrite failed, keeping original content");
        return content;
      }
    },

    async synthesizeHeadline(content, fallback) {
      try {
        const result = await generateText({
          model,
          system: headlinePrompt(language),
          prompt: clip(content),
          experimental_output: Output.object({ schema: headlineOutputSchema }),
        });
        const headline = cleanHeadline(result.experimental_output);
        if (headline.title === "") {
          throw new Error("LLM returned an empty title");
        }
        return {
          ...headline,
          description: headline.description || fallback.description,
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ error: message }, "headline synthesis failed, using fallback");
        return cleanHeadline({ ...fallback, linkPhrase: "" });
      }
    },

    async composeSocialPost(content, abortSignal) {
      const { text } = await generateText({
        model,
        system: socialPostPrompt(language),
        prompt: clip(content),
        abortSignal,
      });
      return text.trim();
    },
  };
}
