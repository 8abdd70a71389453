import type { DatabaseClient } from "./db/client.js";
import { withStore } from "./db/client.js";
import { getModelStates, saveModelState } from "./db/model-states.js";
import { claimForDispatch, completeRecord, failRecord, releaseRecords } from "./db/records.js";
import type { AdmissionEvent, EventType, ModelState } from "./db/types.js";
import type { EngineOutcome, ExecutionEngine } from "./engine/types.js";
import { EngineUnavailableError, describeError } from "./errors.js";
import type { Clock, CostLedger } from "./ledger.js";
import type { Logger } from "./logger.js";

export type CloseReason = "full" | "budget_exhausted" | "no_room" | "solo" | "aged" | "flush";

export type Batch = {
  id: string;
  type: EventType;
  events: AdmissionEvent[];
  opened_at: number;
  closed_at: number;
  close_reason: CloseReason;
};

export type EventOutcomeStatus = "completed" | "failed" | "released" | "skipped";

export type EventOutcome = {
  event_id: string;
  status: EventOutcomeStatus;
  cost: number | null;
  reason: string | null;
};

export type DispatchReport = {
  batch_id: string;
  type: EventType;
  outcomes: EventOutcome[];
};

export type Dispatcher = {
  dispatch: (batch: Batch) => Promise<DispatchReport>;
};

export type DispatcherOptions = {
  db: DatabaseClient;
  engine: ExecutionEngine;
  ledger: CostLedger;
  logger: Logger;
  perEventTimeoutMs: number;
  stateTtlMs: number;
  now?: Clock;
};

class DispatchTimeoutError extends Error {
  name = "DispatchTimeoutError";
}

type Settlement =
  | { kind: "outcome"; outcome: EngineOutcome }
  | { kind: "failure"; reason: string }
  | { kind: "unavailable"; error: EngineUnavailableError };

const withTimeout = <T>(run: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> => {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new DispatchTimeoutError(`timed out after ${ms}ms`));
    }, ms);
    // run may throw synchronously
    Promise.resolve()
      .then(() => run(controller.signal))
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
  });
};

const toUnavailable = (error: unknown): EngineUnavailableError =>
  error instanceof EngineUnavailableError
    ? error
    : new EngineUnavailableError(`Execution engine failed: ${describeError(error)}`, {
        cause: error
      });

export const createDispatcher = ({
  db,
  engine,
  ledger,
  logger,
  perEventTimeoutMs,
  stateTtlMs,
  now = Date.now
}: DispatcherOptions): Dispatcher => {
  const log = logger.child({ module: "dispatcher" });

  const loadStates = (events: AdmissionEvent[]): Map<string, ModelState> =>
    withStore(db, "load cached state", () =>
      getModelStates(
        db,
        events.map((event) => event.id),
        { now: now(), maxAgeMs: stateTtlMs }
      )
    );

  const matchOutcomes = (events: AdmissionEvent[], outcomes: EngineOutcome[]): Settlement[] => {
    const byId = new Map<string, EngineOutcome>();
    for (const outcome of outcomes) {
      if (byId.has(outcome.event_id)) {
        log.warn({ event_id: outcome.event_id }, "engine reported an event twice; keeping the first");
        continue;
      }
      byId.set(outcome.event_id, outcome);
    }

    const expected = new Set(events.map((event) => event.id));
    for (const id of byId.keys()) {
      if (!expected.has(id)) {
        log.warn({ event_id: id }, "engine reported an event outside the batch");
      }
    }

    return events.map((event): Settlement => {
      const outcome = byId.get(event.id);
      return outcome
        ? { kind: "outcome", outcome }
        : { kind: "failure", reason: "no outcome reported" };
    });
  };

  const runBatch = async (events: AdmissionEvent[]): Promise<Settlement[]> => {
    const states = loadStates(events);
    try {
      const outcomes = await withTimeout(
        (signal) => engine.execute(events, { signal, states }),
        perEventTimeoutMs * events.length
      );
      return matchOutcomes(events, outcomes);
    } catch (error) {
      if (error instanceof DispatchTimeoutError) {
        const reason = error.message;
        return events.map((): Settlement => ({ kind: "failure", reason }));
      }
      const unavailable = toUnavailable(error);
      return events.map((): Settlement => ({ kind: "unavailable", error: unavailable }));
    }
  };

  const runPerEvent = (events: AdmissionEvent[]): Promise<Settlement[]> =>
    Promise.all(
      events.map(async (event): Promise<Settlement> => {
        const states = loadStates([event]);
        try {
          const outcomes = await withTimeout(
            (signal) => engine.execute([event], { signal, states }),
            perEventTimeoutMs
          );
          const [settlement] = matchOutcomes([event], outcomes);
          return settlement ?? { kind: "failure", reason: "no outcome reported" };
        } catch (error) {
          if (error instanceof EngineUnavailableError) {
            return { kind: "unavailable", error };
          }
          return { kind: "failure", reason: describeError(error) };
        }
      })
    );

  const settle = (
    batch: Batch,
    events: AdmissionEvent[],
    settlements: Settlement[]
  ): EventOutcome[] => {
    const timestamp = now();
    const released: string[] = [];

    const record = db.transaction(() => {
      const outcomes = events.map((event, index): EventOutcome => {
        const settlement: Settlement = settlements[index] ?? {
          kind: "failure",
          reason: "no outcome reported"
        };

        if (settlement.kind === "unavailable") {
          released.push(event.id);
          return {
            event_id: event.id,
            status: "released",
            cost: null,
            reason: settlement.error.message
          };
        }

        if (settlement.kind === "failure") {
          const failed = failRecord(db, event.id, settlement.reason, timestamp);
          return {
            event_id: event.id,
            status: failed ? "failed" : "skipped",
            cost: null,
            reason: settlement.reason
          };
        }

        const { cost, tokens, state } = settlement.outcome;
        if (settlement.outcome.status === "failure") {
          const reason = settlement.outcome.reason ?? "engine reported failure";
          const failed = failRecord(db, event.id, reason, timestamp);
          if (failed && state) {
            saveModelState(db, event.id, state, timestamp);
          }
          return { event_id: event.id, status: failed ? "failed" : "skipped", cost: null, reason };
        }

        if (!Number.isFinite(cost) || cost < 0) {
          const reason = `invalid cost reported: ${cost}`;
          const failed = failRecord(db, event.id, reason, timestamp);
          return { event_id: event.id, status: failed ? "failed" : "skipped", cost: null, reason };
        }

        if (!completeRecord(db, event.id, cost, tokens ?? null, timestamp)) {
          return { event_id: event.id, status: "skipped", cost: null, reason: "not in flight" };
        }
        if (state) {
          saveModelState(db, event.id, state, timestamp);
        }
        ledger.record({
          eventId: event.id,
          eventType: batch.type,
          amount: cost,
          tokens,
          timestamp
        });
        return { event_id: event.id, status: "completed", cost, reason: null };
      });

      releaseRecords(db, released, timestamp);
      return outcomes;
    });

    return withStore(db, "record dispatch outcomes", () => record());
  };

  return {
    dispatch: async (batch) => {
      const claimedIds = withStore(db, "claim batch", () =>
        claimForDispatch(
          db,
          batch.id,
          batch.events.map((event) => event.id),
          now()
        )
      );
      const claimed = new Set(claimedIds);
      const events = batch.events.filter((event) => claimed.has(event.id));
      const skipped = batch.events
        .filter((event) => !claimed.has(event.id))
        .map(
          (event): EventOutcome => ({
            event_id: event.id,
            status: "skipped",
            cost: null,
            reason: "claimed elsewhere"
          })
        );

      if (!events.length) {
        log.warn({ batch_id: batch.id }, "nothing left to dispatch in batch");
        return { batch_id: batch.id, type: batch.type, outcomes: skipped };
      }

      log.info(
        { batch_id: batch.id, type: batch.type, size: events.length, mode: engine.mode },
        "dispatching batch"
      );

      const settlements =
        engine.mode === "per_event" ? await runPerEvent(events) : await runBatch(events);
      const outcomes = settle(batch, events, settlements);
      const report: DispatchReport = {
        batch_id: batch.id,
        type: batch.type,
        outcomes: [...outcomes, ...skipped]
      };

      const released = outcomes.filter((outcome) => outcome.status === "released");
      log.info(
        {
          batch_id: batch.id,
          completed: outcomes.filter((outcome) => outcome.status === "completed").length,
          failed: outcomes.filter((outcome) => outcome.status === "failed").length,
          released: released.length
        },
        "batch settled"
      );

      const unavailable = settlements.find(
        (settlement): settlement is Extract<Settlement, { kind: "unavailable" }> =>
          settlement.kind === "unavailable"
      );
      if (unavailable) {
        throw new EngineUnavailableError(
          `${released.length} event(s) returned to pending: ${unavailable.error.message}`,
          { cause: unavailable.error }
        );
      }

      return report;
    }
  };
};
