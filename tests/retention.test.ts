import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { DatabaseClient } from "../src/db/client.js";
import { appendCostEntry } from "../src/db/costs.js";
import { getModelState, saveModelState } from "../src/db/model-states.js";
import {
  claimForDispatch,
  completeRecord,
  getRecord,
  insertPendingRecord,
  markAdmitted
} from "../src/db/records.js";
import { makeNoopLogger } from "../src/logger.js";
import { createRetentionManager } from "../src/retention.js";
import { START, makeAdmissionEvent, openTestDatabase } from "./helpers/fixtures.js";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("retention sweep", () => {
  let db: DatabaseClient;

  beforeEach(() => {
    db = openTestDatabase();
  });

  afterEach(() => {
    db.close();
  });

  const complete = (id: string, at: number) => {
    insertPendingRecord(db, makeAdmissionEvent({ id, received_at: at }), at);
    markAdmitted(db, id, `batch-${id}`, at);
    claimForDispatch(db, `batch-${id}`, [id], at);
    completeRecord(db, id, 1, null, at);
  };

  it("removes finished work past the horizon and keeps unfinished work", () => {
    const old = START - 31 * DAY_MS;
    complete("evt-old-done", old);
    complete("evt-recent-done", START - DAY_MS);
    insertPendingRecord(db, makeAdmissionEvent({ id: "evt-old-pending", received_at: old }), old);
    insertPendingRecord(db, makeAdmissionEvent({ id: "evt-old-flight", received_at: old }), old);
    markAdmitted(db, "evt-old-flight", "batch-x", old);
    claimForDispatch(db, "batch-x", ["evt-old-flight"], old);
    appendCostEntry(db, { eventType: "issue", amount: 1, timestamp: old });
    appendCostEntry(db, { eventType: "issue", amount: 2, timestamp: START - DAY_MS });
    saveModelState(db, "evt-old-done", { step: 1 }, START - DAY_MS);
    saveModelState(db, "evt-old-pending", { step: 2 }, old);
    saveModelState(db, "evt-recent-done", { step: 3 }, START - DAY_MS);

    const retention = createRetentionManager({
      db,
      horizonDays: 30,
      logger: makeNoopLogger(),
      now: () => START
    });
    const result = retention.sweep();

    expect(result).toEqual({
      cutoff: START - 30 * DAY_MS,
      records_removed: 1,
      cost_entries_removed: 1,
      model_states_removed: 2,
      stale_unfinished: 2
    });
    expect(getModelState(db, "evt-recent-done", { now: START, maxAgeMs: 2 * DAY_MS })).toEqual({
      step: 3
    });
    expect(getRecord(db, "evt-old-done")).toBeNull();
    expect(getRecord(db, "evt-recent-done")?.status).toBe("completed");
    expect(getRecord(db, "evt-old-pending")?.status).toBe("pending");
    expect(getRecord(db, "evt-old-flight")?.status).toBe("in_flight");
  });

  it("accepts a horizon per call", () => {
    complete("evt-a", START - 2 * DAY_MS);
    const retention = createRetentionManager({
      db,
      horizonDays: 30,
      logger: makeNoopLogger(),
      now: () => START
    });

    expect(retention.sweep(START, 1).records_removed).toBe(1);
  });
});
