// pattern: functional-core
import { escapeHtml, escapeText } from "../pipeline/markup";
import type { TelegramEntity } from "./telegram";

function tagsFor(entity: TelegramEntity): { open: string; close: string } | null {
  switch (entity.type) {
    case "bold":
      return { open: "<b>", close: "</b>" };
    case "italic":
      return { open: "<i>", close: "</i>" };
    case "underline":
      return { open: "<u>", close: "</u>" };
    case "strikethrough":
      return { open: "<s>", close: "</s>" };
    case "spoiler":
      return { open: "<tg-spoiler>", close: "</tg-spoiler>" };
    case "code":
      return { open: "<code>", close: "</code>" };
    case "pre":
      return entity.language
        ? {
            open: `<pre><code class="language-${escapeHtml(entity.language)}">`,
            close: "</code></pre>",
          }
        : { open: "<pre>", close: "</pre>" };
    case "text_link":
      return entity.url
        ? { open: `<a href="${escapeHtml(entity.url)}">`, close: "</a>" }
        : null;
    case "blockquote":
      return { open: "<blockquote>", close: "</blockquote>" };
    case "expandable_blockquote":
      return { open: "<blockquote expandable>", close: "</blockquote>" };
    default:
      return null;
  }
}

/**
 * Rebuilds Telegram-flavoured HTML from a message's plain text and its
 * entities, so a received message can be sent on again with parse_mode HTML.
 * Offsets are UTF-16 code units, which is what JS string indices are.
 */
export function renderMessageHtml(
  text: string,
  entities: ReadonlyArray<TelegramEntity> = [],
): string {
  const sorted = entities
    .map((entity) => ({ entity, tags: tagsFor(entity) }))
    .filter(
      (item): item is { entity: TelegramEntity; tags: { open: string; close: string } } =>
        item.tags !== null && item.entity.length > 0,
    )
    .sort((a, b) => a.entity.offset - b.entity.offset || b.entity.length - a.entity.length);

  const stack: Array<{ end: number; close: string }> = [];
  let out = "";
  let pos = 0;

  const closeUntil = (limit: number) => {
    let top = stack[stack.length - 1];
    while (top && top.end <= limit) {
      out += escapeText(text.slice(pos, top.end));
      pos = top.end;
      out += top.close;
      stack.pop();
      top = stack[stack.length - 1];
    }
  };

  for (const { entity, tags } of sorted) {
    closeUntil(entity.offset);
    out += escapeText(text.slice(pos, entity.offset));
    pos = entity.offset;

    const parent = stack[stack.length - 1];
    const end = Math.min(entity.offset + entity.length, parent?.end ?? text.length);
    out += tags.open;
    stack.push({ end, close: tags.close });
  }

  closeUntil(Number.POSITIVE_INFINITY);
  out += escapeText(text.slice(pos));
  return out;
}
