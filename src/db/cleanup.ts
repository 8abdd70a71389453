import type { DatabaseClient } from "./client.js";
import { countStaleUnfinished } from "./records.js";

export type CleanupOptions = {
  now: number;
  horizonDays: number;
};

export type CleanupResult = {
  cutoff: number;
  records_removed: number;
  cost_entries_removed: number;
  model_states_removed: number;
  stale_unfinished: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Drops finished records, cost entries and cached state older than the horizon,
 * along with state whose record is gone. Records that are pending, in flight or
 * deferred stay regardless of age and are only counted.
 */
export const cleanupExpired = (db: DatabaseClient, options: CleanupOptions): CleanupResult => {
  const cutoff = options.now - options.horizonDays * DAY_MS;

  const cleanup = db.transaction(() => {
    const records = db
      .prepare<[number]>(
        `DELETE FROM processing_records
         WHERE status IN ('completed', 'failed')
           AND COALESCE(completed_at, updated_at) < ?`
      )
      .run(cutoff);

    const costs = db
      .prepare<[number]>("DELETE FROM cost_entries WHERE timestamp < ?")
      .run(cutoff);

    const states = db
      .prepare<[number]>(
        `DELETE FROM model_states
         WHERE updated_at < ?
            OR event_id NOT IN (SELECT event_id FROM processing_records)`
      )
      .run(cutoff);

    return {
      cutoff,
      records_removed: records.changes,
      cost_entries_removed: costs.changes,
      model_states_removed: states.changes,
      stale_unfinished: countStaleUnfinished(db, cutoff)
    };
  });

  return cleanup();
};
