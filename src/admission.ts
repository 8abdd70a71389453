import { ulid } from "ulid";
import type { EngineConfig, TypePolicy } from "./config.js";
import type { DatabaseClient } from "./db/client.js";
import { withStore } from "./db/client.js";
import {
  countActiveForSubject,
  failRecord,
  hasOlderDeferred,
  listReevaluable,
  markAdmitted,
  markDeferred,
  reconcileInFlight,
  releaseOrphanedPending
} from "./db/records.js";
import {
  EVENT_TYPES,
  toAdmissionEvent,
  type AdmissionEvent,
  type EventType,
  type InboundEvent
} from "./db/types.js";
import { admitForDedup } from "./dedup.js";
import type { Batch, CloseReason, DispatchReport, Dispatcher } from "./dispatcher.js";
import { EngineUnavailableError, describeError } from "./errors.js";
import { approximateTokens } from "./ingest.js";
import type { Clock, CostLedger } from "./ledger.js";
import { createKeyedMutex } from "./lock.js";
import type { Logger } from "./logger.js";
import type { RateLimiter } from "./rate-limiter.js";

export type DeferralReason =
  | "total_budget"
  | "cost_ceiling"
  | "soft_throttle"
  | "subject_busy"
  | "rate_limited";

export type RejectionReason = "oversized" | "unsupported_action";

export type AdmissionDecision =
  | { outcome: "admitted"; batchId: string }
  | { outcome: "duplicate" }
  | { outcome: "in_flight" }
  | { outcome: "deferred"; reason: DeferralReason }
  | { outcome: "rejected"; reason: RejectionReason };

export type SweepEntry = {
  event_id: string;
  decision: AdmissionDecision;
};

export type RecoveryReport = {
  reconciled: string[];
  released: number;
  decisions: SweepEntry[];
};

export type SettledDispatches = {
  reports: DispatchReport[];
  errors: unknown[];
};

export type AdmissionController = {
  onEvent: (event: InboundEvent) => Promise<AdmissionDecision>;
  sweep: () => Promise<SweepEntry[]>;
  recover: () => Promise<RecoveryReport>;
  flushAll: () => Promise<void>;
  drain: () => Promise<DispatchReport[]>;
  settle: () => SettledDispatches;
  liveBatchSizes: () => Record<EventType, number>;
  openWindowCount: () => number;
  close: () => void;
};

export type AdmissionControllerOptions = {
  db: DatabaseClient;
  config: EngineConfig;
  ledger: CostLedger;
  limiter: RateLimiter;
  dispatcher: Dispatcher;
  logger: Logger;
  now?: Clock;
};

type BatchWindow = {
  id: string;
  type: EventType;
  openedAt: number;
  events: AdmissionEvent[];
  tokenBudgetRemaining: number;
  timer: NodeJS.Timeout | null;
};

/** Token estimate of an event, never below the type's floor. */
export const estimateTokens = (
  event: Pick<InboundEvent, "payload_summary" | "token_estimate">,
  policy: TypePolicy
): number =>
  Math.max(policy.minTokens, event.token_estimate ?? approximateTokens(event.payload_summary));

const isEnabled = (policy: TypePolicy): boolean => policy.actions.length > 0;

export const createAdmissionController = ({
  db,
  config,
  ledger,
  limiter,
  dispatcher,
  logger,
  now = Date.now
}: AdmissionControllerOptions): AdmissionController => {
  const log = logger.child({ module: "admission" });
  const windows = new Map<EventType, BatchWindow>();
  const typeLocks = createKeyedMutex();
  const subjectLocks = createKeyedMutex();
  const dispatches = new Set<Promise<void>>();
  let reports: DispatchReport[] = [];
  let errors: unknown[] = [];
  let closed = false;

  const policyFor = (type: EventType): TypePolicy => config.types[type];

  const liveBatchSizes = (): Record<EventType, number> => ({
    discussion: windows.get("discussion")?.events.length ?? 0,
    issue: windows.get("issue")?.events.length ?? 0,
    pull_request: windows.get("pull_request")?.events.length ?? 0
  });

  const startDispatch = (batch: Batch) => {
    const task = dispatcher
      .dispatch(batch)
      .then(
        (report) => {
          reports.push(report);
        },
        (error: unknown) => {
          errors.push(error);
          log.error(
            { batch_id: batch.id, type: batch.type, err: error },
            `dispatch failed: ${describeError(error)}`
          );
        }
      )
      .finally(() => {
        dispatches.delete(task);
      });
    dispatches.add(task);
  };

  const closeWindow = (window: BatchWindow, reason: CloseReason) => {
    if (window.timer) {
      clearTimeout(window.timer);
      window.timer = null;
    }
    if (windows.get(window.type) === window) {
      windows.delete(window.type);
    }
    if (!window.events.length) {
      return;
    }

    log.debug(
      { batch_id: window.id, type: window.type, size: window.events.length, reason },
      "closing batch window"
    );
    startDispatch({
      id: window.id,
      type: window.type,
      events: window.events,
      opened_at: window.openedAt,
      closed_at: now(),
      close_reason: reason
    });
  };

  const closeAgedWindow = (type: EventType) => {
    const window = windows.get(type);
    if (window && window.openedAt <= now() - config.batching.flushIntervalMs) {
      closeWindow(window, "aged");
    }
  };

  /** Solo windows are never registered; they close as soon as their one event is in. */
  const openWindow = (type: EventType, register: boolean): BatchWindow => {
    const window: BatchWindow = {
      id: ulid(),
      type,
      openedAt: now(),
      events: [],
      tokenBudgetRemaining: policyFor(type).batchTokenBudget,
      timer: null
    };
    if (!register) {
      return window;
    }

    windows.set(type, window);
    if (!closed) {
      window.timer = setTimeout(() => {
        typeLocks
          .run(type, () => {
            if (windows.get(type) === window) {
              closeWindow(window, "aged");
            }
          })
          .catch((error: unknown) => {
            log.error({ err: error, type }, "failed to flush aged batch window");
          });
      }, config.batching.flushIntervalMs);
      window.timer.unref();
    }
    return window;
  };

  /** Spend, throttle and subject gates first; the limiter goes last since it consumes a token. */
  const checkGates = (event: AdmissionEvent): DeferralReason | null => {
    const { maxTotalCost, maxHourlyRate, targetHourlyRate } = config.cost;

    if (maxTotalCost !== null && ledger.totalSpend() >= maxTotalCost) {
      return "total_budget";
    }

    const rate = ledger.hourlyRate();
    if (rate >= maxHourlyRate) {
      return "cost_ceiling";
    }

    if (rate > targetHourlyRate) {
      const sizes = liveBatchSizes();
      const enabled = EVENT_TYPES.filter((type) => isEnabled(policyFor(type)));
      const smallest = Math.min(...enabled.map((type) => sizes[type]));
      if (sizes[event.type] !== smallest) {
        return "soft_throttle";
      }
      if (hasOlderDeferred(db, event.type, event.received_at, event.id)) {
        return "soft_throttle";
      }
    }

    const subjectCap = config.batching.maxInFlightPerSubject;
    if (subjectCap !== null && countActiveForSubject(db, event.subject_id) >= subjectCap) {
      return "subject_busy";
    }

    if (!limiter.tryAcquire()) {
      return "rate_limited";
    }

    return null;
  };

  /** Puts the event into its type's window and returns the batch id, or null if it was taken. */
  const place = (event: AdmissionEvent): string | null => {
    const policy = policyFor(event.type);
    let window = windows.get(event.type);

    if (
      window &&
      (window.events.length >= policy.batchSize ||
        window.tokenBudgetRemaining < event.token_estimate)
    ) {
      closeWindow(window, "no_room");
      window = undefined;
    }

    if (!window && event.token_estimate > policy.batchTokenBudget) {
      const solo = openWindow(event.type, false);
      if (!markAdmitted(db, event.id, solo.id, now())) {
        return null;
      }
      solo.events.push(event);
      solo.tokenBudgetRemaining = 0;
      closeWindow(solo, "solo");
      return solo.id;
    }

    const target = window ?? openWindow(event.type, true);
    if (!markAdmitted(db, event.id, target.id, now())) {
      if (!target.events.length) {
        closeWindow(target, "flush");
      }
      return null;
    }
    target.events.push(event);
    target.tokenBudgetRemaining -= event.token_estimate;

    if (target.events.length >= policy.batchSize) {
      closeWindow(target, "full");
    } else if (target.tokenBudgetRemaining < Math.max(1, policy.minTokens)) {
      closeWindow(target, "budget_exhausted");
    }
    return target.id;
  };

  const defer = (event: AdmissionEvent, reason: DeferralReason): AdmissionDecision => {
    markDeferred(db, event.id, reason, now());
    log.info({ event_id: event.id, type: event.type, reason }, "event deferred");
    return { outcome: "deferred", reason };
  };

  /** Everything after deduplication; the record already exists and belongs to us. */
  const evaluate = (event: AdmissionEvent): AdmissionDecision => {
    const policy = policyFor(event.type);
    if (event.token_estimate > policy.maxTokens) {
      failRecord(db, event.id, "oversized", now());
      log.warn(
        { event_id: event.id, type: event.type, tokens: event.token_estimate, max: policy.maxTokens },
        "event rejected: token estimate above the per-event maximum"
      );
      return { outcome: "rejected", reason: "oversized" };
    }

    const deferral = checkGates(event);
    if (deferral) {
      return defer(event, deferral);
    }

    const batchId = place(event);
    if (!batchId) {
      return { outcome: "in_flight" };
    }
    log.info({ event_id: event.id, type: event.type, batch_id: batchId }, "event admitted");
    return { outcome: "admitted", batchId };
  };

  const exclusive = <T>(event: { subject_id: string; type: EventType }, task: () => T) =>
    subjectLocks.run(event.subject_id, () => typeLocks.run(event.type, task));

  const onEvent = (input: InboundEvent): Promise<AdmissionDecision> =>
    exclusive(input, () =>
      withStore(db, "admit event", (): AdmissionDecision => {
        closeAgedWindow(input.type);

        const policy = policyFor(input.type);
        if (!policy.actions.includes(input.action)) {
          log.debug(
            { event_id: input.id, type: input.type, action: input.action },
            "action not enabled for type"
          );
          return { outcome: "rejected", reason: "unsupported_action" };
        }

        const event: AdmissionEvent = {
          ...input,
          token_estimate: estimateTokens(input, policy)
        };

        const dedup = admitForDedup(db, event, now());
        if (dedup !== "new") {
          log.debug({ event_id: event.id, outcome: dedup }, "event already known");
          return dedup === "duplicate" ? { outcome: "duplicate" } : { outcome: "in_flight" };
        }
        return evaluate(event);
      })
    );

  const sweep = async (): Promise<SweepEntry[]> => {
    await Promise.all(
      EVENT_TYPES.map((type) => typeLocks.run(type, () => closeAgedWindow(type)))
    );

    const candidates = withStore(db, "list deferred events", () => listReevaluable(db));
    const entries: SweepEntry[] = [];
    for (const record of candidates) {
      const event = toAdmissionEvent(record);
      const decision = await exclusive(event, () =>
        withStore(db, "re-evaluate event", () => evaluate(event))
      );
      entries.push({ event_id: event.id, decision });
    }

    if (entries.length) {
      log.info(
        {
          evaluated: entries.length,
          admitted: entries.filter((entry) => entry.decision.outcome === "admitted").length
        },
        "sweep finished"
      );
    }
    return entries;
  };

  const recover = async (): Promise<RecoveryReport> => {
    const current = now();
    const reconciled = withStore(db, "reconcile in-flight records", () =>
      reconcileInFlight(db, {
        olderThan: current - config.dispatch.reconcileAfterMs,
        now: current
      })
    );
    if (reconciled.length) {
      log.warn(
        { count: reconciled.length, event_ids: reconciled },
        "in-flight records from an earlier run marked failed; resubmit them explicitly"
      );
    }

    const released = windows.size
      ? 0
      : withStore(db, "release orphaned records", () => releaseOrphanedPending(db, current));
    const decisions = await sweep();
    return { reconciled, released, decisions };
  };

  const flushAll = async (): Promise<void> => {
    await Promise.all(
      EVENT_TYPES.map((type) =>
        typeLocks.run(type, () => {
          const window = windows.get(type);
          if (window) {
            closeWindow(window, "flush");
          }
        })
      )
    );
  };

  const settle = (): SettledDispatches => {
    const settled = { reports, errors };
    reports = [];
    errors = [];
    return settled;
  };

  const drain = async (): Promise<DispatchReport[]> => {
    while (dispatches.size) {
      await Promise.all([...dispatches]);
    }
    const settled = settle();
    const [firstError] = settled.errors;
    if (firstError !== undefined) {
      const unavailable = settled.errors.find((error) => error instanceof EngineUnavailableError);
      throw unavailable ?? firstError;
    }
    return settled.reports;
  };

  return {
    onEvent,
    sweep,
    recover,
    flushAll,
    drain,
    settle,
    liveBatchSizes,
    openWindowCount: () => windows.size,
    close: () => {
      closed = true;
      for (const window of windows.values()) {
        if (window.timer) {
          clearTimeout(window.timer);
          window.timer = null;
        }
      }
    }
  };
};
