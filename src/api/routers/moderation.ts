// pattern: Imperative Shell
import { z } from "zod/v3";
import { router, publicProcedure } from "../trpc";
import { getRecentHostedArticles } from "../../pipeline/dedup";
import { renderHeadlineHtml } from "../../pipeline/headline";

export const moderationRouter = router({
  /**
   * Sends the latest hosted articles to the review chat again, as fresh
   * drafts with working approval buttons. Failures are counted, not thrown.
   */
  resend: publicProcedure
    .input(z.object({ limit: z.number().int().min(1).max(50).default(5) }))
    .mutation(async ({ ctx, input }) => {
      const recent = getRecentHostedArticles(ctx.db, input.limit);
      let sent = 0;
      let failed = 0;

      for (const article of recent) {
        if (!article.hostedUrl) continue;
        try {
          await ctx.moderation.submit({
            title: renderHeadlineHtml(
              { title: article.title, description: article.description ?? "", linkPhrase: "" },
              article.hostedUrl,
            ),
            shortDescription:
              article.description ?? ctx.config.transform.fallbackDescription,
            sourceUrl: article.originalUrl,
            articleId: article.id,
          });
          sent++;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          ctx.logger.error({ articleId: article.id, error: message }, "resend failed");
          failed++;
        }
      }

      ctx.logger.info({ sent, failed }, "drafts resent for moderation");
      return { sent, failed };
    }),
});
