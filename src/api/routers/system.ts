// pattern: Imperative Shell
import { count, isNotNull, max } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { articles } from "../../db/schema";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const totals = ctx.db
      .select({ articleCount: count(), latestArticleAt: max(articles.createdAt) })
      .from(articles)
      .get();

    const hosted = ctx.db
      .select({ hostedCount: count() })
      .from(articles)
      .where(isNotNull(articles.hostedUrl))
      .get();

    return {
      provider: ctx.config.llm.provider,
      model: ctx.config.llm.model,
      feedCount: ctx.config.feeds.length,
      pollIntervalSeconds: ctx.config.ingest.pollIntervalSeconds,
      articleCount: totals?.articleCount ?? 0,
      hostedCount: hosted?.hostedCount ?? 0,
      latestArticleAt: totals?.latestArticleAt ?? null,
      tickInFlight: ctx.scheduler.isRunning(),
    };
  }),

  /** Starts a tick now without waiting for it; `started: false` if one is running. */
  pollNow: publicProcedure.mutation(({ ctx }) => {
    if (ctx.scheduler.isRunning()) {
      ctx.logger.info("poll requested while a tick is running, ignoring");
      return { started: false };
    }
    void ctx.scheduler.trigger();
    ctx.logger.info("poll triggered from api");
    return { started: true };
  }),
});
