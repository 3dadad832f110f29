// pattern: Imperative Shell
import { router } from "./trpc";
import { articlesRouter } from "./routers/articles";
import { moderationRouter } from "./routers/moderation";
import { systemRouter } from "./routers/system";

export const appRouter = router({
  articles: articlesRouter,
  moderation: moderationRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
