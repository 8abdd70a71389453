import { createAdmissionController, type AdmissionController } from "./admission.js";
import type { EngineConfig } from "./config.js";
import type { DatabaseClient } from "./db/client.js";
import { createDispatcher, type Dispatcher } from "./dispatcher.js";
import type { ExecutionEngine } from "./engine/types.js";
import { createCostLedger, type Clock, type CostLedger } from "./ledger.js";
import type { Logger } from "./logger.js";
import { createRateLimiter, type RateLimiter } from "./rate-limiter.js";
import { createRetentionManager, type RetentionManager } from "./retention.js";
import { checkStaleWork, collectSnapshot, type Snapshot } from "./stats.js";

/** `bot` is long-running; `action` handles one event; `sweep` is a single scheduling pass. */
export type RunKind = "bot" | "action" | "sweep";

export type RuntimeOptions = {
  db: DatabaseClient;
  config: EngineConfig;
  engine: ExecutionEngine;
  logger: Logger;
  now?: Clock;
  kind?: RunKind;
  /** Overrides the starting fill of the request bucket. */
  initialTokens?: number;
};

export type Runtime = {
  db: DatabaseClient;
  config: EngineConfig;
  ledger: CostLedger;
  limiter: RateLimiter;
  dispatcher: Dispatcher;
  controller: AdmissionController;
  retention: RetentionManager;
  logger: Logger;
  snapshot: () => Snapshot;
  checkStaleWork: () => number;
  close: () => void;
};

/**
 * Starting fill of the request bucket. A restarted bot refills from the
 * configured level, an action run gets at least one token for its event and a
 * sweep pass starts with a full burst.
 */
export const initialTokensFor = (config: EngineConfig, kind: RunKind): number => {
  const { initialTokens, burst } = config.rateLimit;
  switch (kind) {
    case "bot":
      return initialTokens;
    case "action":
      return Math.max(initialTokens, 1);
    case "sweep":
      return Math.max(initialTokens, burst);
  }
};

export const createRuntime = ({
  db,
  config,
  engine,
  logger,
  now = Date.now,
  kind = "bot",
  initialTokens
}: RuntimeOptions): Runtime => {
  const ledger = createCostLedger({ db, now });
  const limiter = createRateLimiter({
    requestsPerHour: config.rateLimit.requestsPerHour,
    burst: config.rateLimit.burst,
    initialTokens: initialTokens ?? initialTokensFor(config, kind),
    now
  });
  const dispatcher = createDispatcher({
    db,
    engine,
    ledger,
    logger,
    perEventTimeoutMs: config.dispatch.perEventTimeoutMs,
    stateTtlMs: config.stateCache.ttlMs,
    now
  });
  const controller = createAdmissionController({
    db,
    config,
    ledger,
    limiter,
    dispatcher,
    logger,
    now
  });
  const retention = createRetentionManager({
    db,
    horizonDays: config.retention.horizonDays,
    logger,
    now
  });

  return {
    db,
    config,
    ledger,
    limiter,
    dispatcher,
    controller,
    retention,
    logger,
    snapshot: () => collectSnapshot({ db, config, ledger, limiter, controller, logger, now }),
    checkStaleWork: () => checkStaleWork({ db, config, logger, now }),
    close: () => {
      controller.close();
    }
  };
};

export type { AdmissionDecision, DeferralReason, RejectionReason } from "./admission.js";
export type { EngineConfig, TypePolicy } from "./config.js";
export type { AdmissionEvent, EventType, InboundEvent, ProcessingRecord } from "./db/types.js";
export type { DispatchReport, EventOutcome } from "./dispatcher.js";
export type { EngineOutcome, ExecutionEngine } from "./engine/types.js";
