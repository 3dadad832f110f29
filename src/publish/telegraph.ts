// pattern: Imperative Shell
import * as cheerio from "cheerio";
import { isTag, isText } from "domhandler";
import type { AnyNode } from "domhandler";
import { z } from "zod/v3";
import type { Logger } from "pino";
import { normalizeMarkup } from "../pipeline/markup";

export type TelegraphElement = {
  readonly tag: string;
  readonly attrs?: { readonly href?: string; readonly src?: string };
  readonly children?: ReadonlyArray<TelegraphNode>;
};

export type TelegraphNode = string | TelegraphElement;

/**
 * Discriminated union result for hosting. Never throws.
 */
export type PublishResult =
  | { readonly success: true; readonly url: string }
  | { readonly success: false; readonly error: string };

export type Publisher = {
  readonly publish: (title: string, contentHtml: string) => Promise<PublishResult>;
};

const ALLOWED_TAGS = new Set([
  "a", "aside", "b", "blockquote", "br", "code", "em", "figcaption", "figure",
  "h3", "h4", "hr", "i", "iframe", "img", "li", "ol", "p", "pre", "s",
  "strong", "u", "ul", "video",
]);

const MAX_TITLE_LENGTH = 256;

const createPageResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ url: z.string().url() }).optional(),
  error: z.string().optional(),
});

function convertNodes(nodes: ReadonlyArray<AnyNode>, topLevel: boolean): Array<TelegraphNode> {
  const out: Array<TelegraphNode> = [];

  for (const node of nodes) {
    if (isText(node)) {
      if (topLevel && node.data.trim() === "") continue;
      out.push(node.data);
      continue;
    }
    if (!isTag(node)) continue;

    const tag = node.name.toLowerCase();
    const children = convertNodes(node.children, false);
    if (!ALLOWED_TAGS.has(tag)) {
      out.push(...children);
      continue;
    }

    const href = node.attribs["href"];
    const src = node.attribs["src"];
    const attrs = {
      ...(href !== undefined && { href }),
      ...(src !== undefined && { src }),
    };

    out.push({
      tag,
      ...(Object.keys(attrs).length > 0 && { attrs }),
      ...(children.length > 0 && { children }),
    });
  }

  return out;
}

/**
 * Converts normalized article markup into Telegraph's content tree. Tags the
 * service does not accept are unwrapped, attributes other than href/src dropped.
 */
export function htmlToTelegraphNodes(html: string): Array<TelegraphNode> {
  const $ = cheerio.load(normalizeMarkup(html), null, false);
  return convertNodes($.root().contents().toArray(), true);
}

/**
 * Creates a Telegraph-backed publisher bound to one account token.
 *
 * @param accessToken - Telegraph account access token
 * @param authorName - Shown as the byline of every page
 * @param logger - Receives one record per page created or failed
 * @param baseUrl - API root, replaceable in tests
 */
export function createTelegraphPublisher(
  accessToken: string,
  authorName: string,
  logger: Logger,
  baseUrl = "https://api.telegra.ph",
): Publisher {
  return {
    async publish(title, contentHtml) {
      const content = htmlToTelegraphNodes(contentHtml);
      if (content.length === 0) {
        return { success: false, error: "no content to publish" };
      }

      try {
        const response = await fetch(`${baseUrl}/createPage`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          signal: AbortSignal.timeout(30000),
          body: JSON.stringify({
            access_token: accessToken,
            title: title.slice(0, MAX_TITLE_LENGTH),
            author_name: authorName,
            content,
            return_content: false,
          }),
        });

        const parsed = createPageResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new Error(`unexpected createPage response (HTTP ${response.status})`);
        }
        if (!parsed.data.ok || !parsed.data.result) {
          throw new Error(parsed.data.error ?? "createPage returned ok=false");
        }

        logger.info({ url: parsed.data.result.url }, "hosted page created");
        return { success: true, url: parsed.data.result.url };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ title, error: message }, "hosted page creation failed");
        return { success: false, error: message };
      }
    },
  };
}
