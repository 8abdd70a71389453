import type { DatabaseClient } from "./db/client.js";
import { withStore } from "./db/client.js";
import { cleanupExpired, type CleanupResult } from "./db/cleanup.js";
import type { Clock } from "./ledger.js";
import type { Logger } from "./logger.js";

export type RetentionManager = {
  sweep: (now?: number, horizonDays?: number) => CleanupResult;
};

export type RetentionOptions = {
  db: DatabaseClient;
  horizonDays: number;
  logger: Logger;
  now?: Clock;
};

export const createRetentionManager = ({
  db,
  horizonDays,
  logger,
  now = Date.now
}: RetentionOptions): RetentionManager => {
  const log = logger.child({ module: "retention" });

  return {
    sweep: (at = now(), days = horizonDays) => {
      const result = withStore(db, "retention sweep", () =>
        cleanupExpired(db, { now: at, horizonDays: days })
      );

      log.info(
        {
          records_removed: result.records_removed,
          cost_entries_removed: result.cost_entries_removed,
          model_states_removed: result.model_states_removed,
          horizon_days: days
        },
        "retention sweep finished"
      );
      if (result.stale_unfinished > 0) {
        log.warn(
          { stale_unfinished: result.stale_unfinished, horizon_days: days },
          "unfinished records older than the retention horizon"
        );
      }
      return result;
    }
  };
};
