import type { AdmissionController } from "./admission.js";
import type { EngineConfig } from "./config.js";
import type { DatabaseClient } from "./db/client.js";
import { withStore } from "./db/client.js";
import { countByStatus, countStaleUnfinished } from "./db/records.js";
import type { EventType, RecordStatus } from "./db/types.js";
import { HOUR_MS, type Clock, type CostLedger } from "./ledger.js";
import type { Logger } from "./logger.js";
import type { RateLimiter } from "./rate-limiter.js";

export type Snapshot = {
  hourly_rate: number;
  average_hourly_rate_24h: number;
  total_spend: number;
  spend_by_type: Record<EventType, number>;
  efficiency: number;
  target_hourly_rate: number;
  max_hourly_rate: number;
  records: Record<RecordStatus, number>;
  stale_pending: number;
  open_windows: number;
  live_batch_sizes: Record<EventType, number>;
  rate_limiter: {
    available: number;
    saturation: number;
  };
};

export type SnapshotSources = {
  db: DatabaseClient;
  config: EngineConfig;
  ledger: CostLedger;
  limiter: RateLimiter;
  controller: AdmissionController;
  logger?: Logger;
  now?: Clock;
};

export type StaleWorkSources = {
  db: DatabaseClient;
  config: EngineConfig;
  logger?: Logger;
  now?: Clock;
};

/** Counts unfinished records past the stale threshold and raises the alert log line for them. */
export const checkStaleWork = ({
  db,
  config,
  logger,
  now = Date.now
}: StaleWorkSources): number => {
  const staleBefore = now() - config.retention.staleAfterHours * HOUR_MS;
  const stale = withStore(db, "count stale work", () => countStaleUnfinished(db, staleBefore));

  if (stale > 0) {
    logger?.warn(
      { stale_pending: stale, stale_after_hours: config.retention.staleAfterHours },
      "events have been waiting longer than the stale threshold"
    );
  }
  return stale;
};

/** Read-only view for monitoring; the only side effect is the stale-work alert log line. */
export const collectSnapshot = ({
  db,
  config,
  ledger,
  limiter,
  controller,
  logger,
  now = Date.now
}: SnapshotSources): Snapshot => {
  const counts = withStore(db, "collect snapshot", () => ({
    hourly_rate: ledger.hourlyRate(),
    average_hourly_rate_24h: ledger.averageHourlyRate(24),
    total_spend: ledger.totalSpend(),
    spend_by_type: ledger.spendByType(),
    efficiency: ledger.efficiency(config.cost.targetHourlyRate),
    records: countByStatus(db)
  }));

  return {
    hourly_rate: counts.hourly_rate,
    average_hourly_rate_24h: counts.average_hourly_rate_24h,
    total_spend: counts.total_spend,
    spend_by_type: counts.spend_by_type,
    efficiency: counts.efficiency,
    target_hourly_rate: config.cost.targetHourlyRate,
    max_hourly_rate: config.cost.maxHourlyRate,
    records: counts.records,
    stale_pending: checkStaleWork({ db, config, logger, now }),
    open_windows: controller.openWindowCount(),
    live_batch_sizes: controller.liveBatchSizes(),
    rate_limiter: {
      available: limiter.available(),
      saturation: limiter.saturation()
    }
  };
};
