// pattern: Imperative Shell
import { z } from "zod/v3";
import { desc, eq, isNotNull } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { articles } from "../../db/schema";

/**
 * Read-only access to stored articles, newest first.
 */
export const articlesRouter = router({
  list: publicProcedure
    .input(
      z.object({
        limit: z.number().int().positive().max(200).default(50),
        offset: z.number().int().nonnegative().default(0),
        hostedOnly: z.boolean().default(false),
      }),
    )
    .query(({ ctx, input }) => {
      return ctx.db
        .select()
        .from(articles)
        .where(input.hostedOnly ? isNotNull(articles.hostedUrl) : undefined)
        .orderBy(desc(articles.createdAt), desc(articles.id))
        .limit(input.limit)
        .offset(input.offset)
        .all();
    }),

  getById: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .query(({ ctx, input }) => {
      const article = ctx.db
        .select()
        .from(articles)
        .where(eq(articles.id, input.id))
        .get();

      return article ?? null;
    }),
});
