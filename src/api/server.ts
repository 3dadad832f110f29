// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";

/**
 * Express app with the tRPC router at `/api/trpc` and `/health` for
 * container checks. Not started; the caller picks the port.
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
      onError: ({ path, error }) => {
        context.logger.error({ path, error: error.message }, "api procedure failed");
      },
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
