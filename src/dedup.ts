import type { DatabaseClient } from "./db/client.js";
import { insertPendingRecord } from "./db/records.js";
import type { AdmissionEvent, RecordStatus } from "./db/types.js";

export type DedupOutcome = "new" | "duplicate" | "in_flight";

const outcomeFor = (status: RecordStatus): DedupOutcome => {
  switch (status) {
    case "completed":
    case "failed":
      return "duplicate";
    case "pending":
    case "in_flight":
    case "deferred":
      return "in_flight";
  }
};

/**
 * Re-delivery is idempotent re-entry: the insert either creates the pending
 * record (this delivery owns the event) or reports what the winner left behind.
 */
export const admitForDedup = (
  db: DatabaseClient,
  event: AdmissionEvent,
  now: number
): DedupOutcome => {
  const { inserted, record } = insertPendingRecord(db, event, now);
  if (inserted) {
    return "new";
  }
  return outcomeFor(record.status);
};
