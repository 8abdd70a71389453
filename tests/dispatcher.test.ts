import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DatabaseClient } from "../src/db/client.js";
import { listCostEntries } from "../src/db/costs.js";
import { getModelState, saveModelState } from "../src/db/model-states.js";
import { failRecord, getRecord, insertPendingRecord } from "../src/db/records.js";
import type { AdmissionEvent } from "../src/db/types.js";
import { createDispatcher, type Batch } from "../src/dispatcher.js";
import type { EngineOutcome, ExecutionEngine } from "../src/engine/types.js";
import { EngineUnavailableError } from "../src/errors.js";
import { HOUR_MS, createCostLedger } from "../src/ledger.js";
import { makeNoopLogger } from "../src/logger.js";
import {
  START,
  createFakeEngine,
  makeAdmissionEvent,
  openTestDatabase,
  seedAdmitted
} from "./helpers/fixtures.js";

const makeBatch = (events: AdmissionEvent[], id = "batch-1"): Batch => ({
  id,
  type: "issue",
  events,
  opened_at: START,
  closed_at: START,
  close_reason: "flush"
});

describe("dispatcher", () => {
  let db: DatabaseClient;

  beforeEach(() => {
    db = openTestDatabase();
  });

  afterEach(() => {
    db.close();
  });

  const dispatcherFor = (engine: ExecutionEngine, perEventTimeoutMs = 5000) =>
    createDispatcher({
      db,
      engine,
      ledger: createCostLedger({ db, now: () => START }),
      logger: makeNoopLogger(),
      perEventTimeoutMs,
      stateTtlMs: HOUR_MS,
      now: () => START
    });

  it("settles each event of a batch on its own outcome", async () => {
    const events = [1, 2, 3, 4, 5].map((n) => makeAdmissionEvent({ id: `evt-${n}` }));
    seedAdmitted(db, events, "batch-1", START);
    const engine = createFakeEngine((batch) =>
      batch.map(
        (event): EngineOutcome =>
          event.id === "evt-3"
            ? { event_id: event.id, status: "failure", cost: 0, reason: "agent crashed" }
            : { event_id: event.id, status: "success", cost: 0.5, tokens: 120 }
      )
    );

    const report = await dispatcherFor(engine).dispatch(makeBatch(events));

    expect(report.outcomes.map((outcome) => [outcome.event_id, outcome.status])).toEqual([
      ["evt-1", "completed"],
      ["evt-2", "completed"],
      ["evt-3", "failed"],
      ["evt-4", "completed"],
      ["evt-5", "completed"]
    ]);
    expect(getRecord(db, "evt-3")?.reason).toBe("agent crashed");
    expect(getRecord(db, "evt-1")?.realized_tokens).toBe(120);
    expect(listCostEntries(db)).toHaveLength(4);
  });

  it("returns the batch to pending when the engine cannot be reached", async () => {
    const events = [makeAdmissionEvent({ id: "evt-1" }), makeAdmissionEvent({ id: "evt-2" })];
    seedAdmitted(db, events, "batch-1", START);
    const engine = createFakeEngine(() => {
      throw new Error("connection refused");
    });

    await expect(dispatcherFor(engine).dispatch(makeBatch(events))).rejects.toThrow(
      new EngineUnavailableError(
        "2 event(s) returned to pending: Execution engine failed: connection refused"
      )
    );
    expect(getRecord(db, "evt-1")?.status).toBe("pending");
    expect(getRecord(db, "evt-2")?.batch_id).toBeNull();
    expect(listCostEntries(db)).toEqual([]);
  });

  it("fails an event whose per-event call times out", async () => {
    const events = [makeAdmissionEvent({ id: "evt-fast" }), makeAdmissionEvent({ id: "evt-slow" })];
    seedAdmitted(db, events, "batch-1", START);
    const engine = createFakeEngine(
      ([event], { signal }) =>
        new Promise<EngineOutcome[]>((resolve, reject) => {
          if (event?.id === "evt-fast") {
            resolve([{ event_id: event.id, status: "success", cost: 1 }]);
            return;
          }
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      "per_event"
    );

    const report = await dispatcherFor(engine, 20).dispatch(makeBatch(events));

    expect(report.outcomes).toEqual([
      { event_id: "evt-fast", status: "completed", cost: 1, reason: null },
      { event_id: "evt-slow", status: "failed", cost: null, reason: "timed out after 20ms" }
    ]);
    expect(engine.calls).toHaveLength(2);
  });

  it("fails events the engine leaves unreported", async () => {
    const events = [makeAdmissionEvent({ id: "evt-1" }), makeAdmissionEvent({ id: "evt-2" })];
    seedAdmitted(db, events, "batch-1", START);
    const engine = createFakeEngine(() => [
      { event_id: "evt-1", status: "success", cost: 1 },
      { event_id: "evt-unknown", status: "success", cost: 3 }
    ]);

    const report = await dispatcherFor(engine).dispatch(makeBatch(events));

    expect(report.outcomes[1]).toEqual({
      event_id: "evt-2",
      status: "failed",
      cost: null,
      reason: "no outcome reported"
    });
    expect(listCostEntries(db).map((entry) => entry.event_id)).toEqual(["evt-1"]);
  });

  it("fails an event reported with an invalid cost", async () => {
    const events = [makeAdmissionEvent({ id: "evt-1" })];
    seedAdmitted(db, events, "batch-1", START);
    const engine = createFakeEngine(() => [{ event_id: "evt-1", status: "success", cost: -2 }]);

    const report = await dispatcherFor(engine).dispatch(makeBatch(events));

    expect(report.outcomes[0]?.reason).toBe("invalid cost reported: -2");
    expect(getRecord(db, "evt-1")?.status).toBe("failed");
  });

  it("skips events another dispatcher already claimed", async () => {
    const events = [makeAdmissionEvent({ id: "evt-1" })];
    insertPendingRecord(db, events[0] ?? makeAdmissionEvent(), START);
    const engine = createFakeEngine();

    const report = await dispatcherFor(engine).dispatch(makeBatch(events));

    expect(report.outcomes).toEqual([
      { event_id: "evt-1", status: "skipped", cost: null, reason: "claimed elsewhere" }
    ]);
    expect(engine.calls).toEqual([]);
  });

  it("skips an invalid-cost outcome for a record settled elsewhere", async () => {
    const events = [makeAdmissionEvent({ id: "evt-1" })];
    seedAdmitted(db, events, "batch-1", START);
    const engine = createFakeEngine(() => {
      failRecord(db, "evt-1", "cancelled by operator", START);
      return [{ event_id: "evt-1", status: "success", cost: -2 }];
    });

    const report = await dispatcherFor(engine).dispatch(makeBatch(events));

    expect(report.outcomes).toEqual([
      { event_id: "evt-1", status: "skipped", cost: null, reason: "invalid cost reported: -2" }
    ]);
    expect(getRecord(db, "evt-1")?.reason).toBe("cancelled by operator");
  });

  it("clears the timeout when the engine throws synchronously", async () => {
    vi.useFakeTimers();
    try {
      const events = [makeAdmissionEvent({ id: "evt-1" })];
      seedAdmitted(db, events, "batch-1", START);
      const engine: ExecutionEngine = {
        mode: "batch",
        execute: () => {
          throw new Error("engine not started");
        }
      };

      await expect(dispatcherFor(engine).dispatch(makeBatch(events))).rejects.toBeInstanceOf(
        EngineUnavailableError
      );
      expect(vi.getTimerCount()).toBe(0);
      expect(getRecord(db, "evt-1")?.status).toBe("pending");
    } finally {
      vi.useRealTimers();
    }
  });

  it("hands fresh cached state to the engine and stores the state it reports", async () => {
    const events = [makeAdmissionEvent({ id: "evt-1" }), makeAdmissionEvent({ id: "evt-2" })];
    seedAdmitted(db, events, "batch-1", START);
    saveModelState(db, "evt-1", { step: 3 }, START - 1000);
    saveModelState(db, "evt-2", { step: 1 }, START - 2 * HOUR_MS);
    const seen: Record<string, unknown>[] = [];
    const engine = createFakeEngine((batch, { states }) => {
      seen.push(Object.fromEntries(states));
      return batch.map(
        (event): EngineOutcome =>
          event.id === "evt-1"
            ? { event_id: event.id, status: "success", cost: 1, state: { step: 4 } }
            : { event_id: event.id, status: "failure", cost: 0, state: { step: 2 } }
      );
    });

    await dispatcherFor(engine).dispatch(makeBatch(events));

    expect(seen).toEqual([{ "evt-1": { step: 3 } }]);
    expect(getModelState(db, "evt-1", { now: START, maxAgeMs: HOUR_MS })).toEqual({ step: 4 });
    expect(getModelState(db, "evt-2", { now: START, maxAgeMs: HOUR_MS })).toEqual({ step: 2 });
  });
});
