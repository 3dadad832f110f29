import { and, desc, eq, isNotNull, ne, sql } from "drizzle-orm";
import { articles } from "../db/schema";
import type { Article } from "../db/schema";
import type { AppDatabase } from "../db";

/**
 * Stored as `original_content` when the duplicate check rejects a candidate,
 * so the URL counts as seen without keeping or re-checking its body.
 */
export const SEMANTIC_DUPLICATE_SENTINEL = "SEMANTIC_DUPLICATE_CHECKED";

/**
 * The authoritative "seen" gate. Runs before any fetch or LLM call.
 */
export function articleExists(db: AppDatabase, url: string): boolean {
  const row = db
    .select({ id: articles.id })
    .from(articles)
    .where(eq(articles.originalUrl, url))
    .get();

  return row !== undefined;
}

export type BaseArticle = {
  readonly url: string;
  readonly title: string;
  readonly content: string;
  readonly description?: string | null;
  readonly imageUrl?: string | null;
};

/**
 * Inserts the base row for a URL. Returns the new id, or `null` when the URL
 * is already stored (another feed or an overlapping run got there first).
 */
export function insertArticleBase(
  db: AppDatabase,
  article: BaseArticle,
): number | null {
  const row = db
    .insert(articles)
    .values({
      originalUrl: article.url,
      title: article.title,
      originalContent: article.content,
      description: article.description ?? null,
      imageUrl: article.imageUrl ?? null,
    })
    .onConflictDoNothing({ target: articles.originalUrl })
    .returning({ id: articles.id })
    .get();

  return row?.id ?? null;
}

/**
 * Records the rewritten body and hosted page. Keyed by id, so repeating it is harmless.
 */
export function updateArticleFinal(
  db: AppDatabase,
  id: number,
  translatedContent: string,
  hostedUrl: string,
): void {
  db.update(articles)
    .set({ translatedContent, hostedUrl })
    .where(eq(articles.id, id))
    .run();
}

/**
 * Original bodies of the latest articles created today (local time), newest
 * first. Used only as comparison context for the duplicate check, so the
 * limit bounds both the query and the prompt.
 */
export function getRecentSameDayContent(
  db: AppDatabase,
  limit = 5,
): Array<string> {
  const rows = db
    .select({ content: articles.originalContent })
    .from(articles)
    .where(
      and(
        isNotNull(articles.originalContent),
        ne(articles.originalContent, SEMANTIC_DUPLICATE_SENTINEL),
        sql`date(${articles.createdAt}, 'unixepoch', 'localtime') = date('now', 'localtime')`,
      ),
    )
    .orderBy(desc(articles.createdAt), desc(articles.id))
    .limit(limit)
    .all();

  return rows.flatMap((row) => (row.content === null ? [] : [row.content]));
}

export function getArticleById(
  db: AppDatabase,
  id: number,
): Article | undefined {
  return db.select().from(articles).where(eq(articles.id, id)).get();
}

/**
 * Latest articles that made it all the way to a hosted page.
 */
export function getRecentHostedArticles(
  db: AppDatabase,
  limit: number,
): Array<Article> {
  return db
    .select()
    .from(articles)
    .where(and(isNotNull(articles.hostedUrl), isNotNull(articles.translatedContent)))
    .orderBy(desc(articles.id))
    .limit(limit)
    .all();
}
