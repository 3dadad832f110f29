// pattern: Functional Core
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { ModerationSubmitter } from "../moderation/gateway";
import type { Logger } from "pino";
import type { PollScheduler } from "../scheduler";

/**
 * tRPC context passed to every procedure. `moderation` is the same submitter
 * the ingestion pipeline uses, so resent drafts are indistinguishable from
 * fresh ones. `scheduler` lets an operator start a tick between intervals.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly moderation: ModerationSubmitter;
  readonly scheduler: Pick<PollScheduler, "trigger" | "isRunning">;
};
