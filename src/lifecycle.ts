// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Anything the process has to wind down before exit: the poll scheduler, the
 * moderation listener, the HTTP server.
 */
export type Stoppable = {
  readonly name: string;
  readonly stop: () => void | Promise<void>;
};

export type ShutdownDeps = {
  readonly services: ReadonlyArray<Stoppable>;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Stops every service in order, then closes the database. A failing step is
 * logged and the rest still run. Safe to call more than once; later calls
 * resolve with the first one.
 */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  let pending: Promise<void> | null = null;

  const run = async (signal: string) => {
    deps.logger.info({ signal }, "shutdown signal received");

    for (const service of deps.services) {
      try {
        await service.stop();
        deps.logger.info({ service: service.name }, "service stopped");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ service: service.name, error: message }, "error stopping service");
      }
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing database");
    }

    deps.logger.info("shutdown complete");
  };

  return (signal) => {
    if (!pending) pending = run(signal);
    return pending;
  };
}

/**
 * Registers SIGTERM and SIGINT handlers that run the shutdown sequence once
 * and exit with code 0.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);

  const onSignal = (signal: string) => {
    void shutdown(signal).then(() => process.exit(0));
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}
