import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";

export type PollScheduler = {
  readonly stop: () => void;
  /** Starts a tick now unless one is already running. */
  readonly trigger: () => Promise<boolean>;
  readonly isRunning: () => boolean;
};

export type SingleFlight = {
  /** `false` when the call was dropped because a run was in flight. */
  readonly run: () => Promise<boolean>;
  readonly isRunning: () => boolean;
};

/**
 * Wraps a job so at most one execution is in flight. A call made while one
 * runs is dropped, not queued. Errors are logged here and never escape.
 */
export function createSingleFlight(
  job: () => Promise<unknown>,
  logger: Logger,
): SingleFlight {
  let running = false;

  return {
    async run() {
      if (running) {
        logger.info("previous tick still running, skipping");
        return false;
      }
      running = true;
      try {
        await job();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "tick failed unexpectedly");
      } finally {
        running = false;
      }
      return true;
    },
    isRunning: () => running,
  };
}

const HEARTBEAT_MS = 30_000;

/**
 * Checks once a second whether `pollIntervalSeconds` has passed since the last
 * tick was due and, if so, requests one through the single-flight guard; a
 * request that lands on a running tick is dropped and the next interval picks
 * the work up. The first check fires immediately. Heartbeat every 30 seconds.
 *
 * @param tick - The pipeline run, e.g. `() => runTick(deps)`
 * @param config - Supplies ingest.pollIntervalSeconds
 * @param logger - Logger for tick and heartbeat records
 * @param now - Clock, replaceable in tests
 */
export function createPollScheduler(
  tick: () => Promise<unknown>,
  config: AppConfig,
  logger: Logger,
  now: () => number = Date.now,
): PollScheduler {
  const intervalMs = config.ingest.pollIntervalSeconds * 1000;
  const flight = createSingleFlight(tick, logger);
  let lastTickAt = Number.NEGATIVE_INFINITY;
  let lastHeartbeatAt = Number.NEGATIVE_INFINITY;

  const task: ScheduledTask = cron.schedule("* * * * * *", () => {
    const current = now();

    if (current - lastHeartbeatAt >= HEARTBEAT_MS) {
      lastHeartbeatAt = current;
      logger.debug({ tickInFlight: flight.isRunning() }, "heartbeat");
    }

    if (current - lastTickAt >= intervalMs) {
      lastTickAt = current;
      void flight.run();
    }
  });

  return {
    stop: () => {
      task.stop();
    },
    trigger: () => flight.run(),
    isRunning: () => flight.isRunning(),
  };
}
