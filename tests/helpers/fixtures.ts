import { parseEngineConfig, type DispatchMode, type EngineConfig } from "../../src/config.js";
import { openDatabase, type DatabaseClient } from "../../src/db/client.js";
import { insertPendingRecord, markAdmitted } from "../../src/db/records.js";
import type { AdmissionEvent, InboundEvent } from "../../src/db/types.js";
import type { EngineOutcome, ExecuteOptions, ExecutionEngine } from "../../src/engine/types.js";
import { makeNoopLogger, type Logger } from "../../src/logger.js";
import { createRuntime, type Runtime } from "../../src/runtime.js";

export const START = Date.UTC(2026, 0, 15, 10, 0, 0);

export type TestClock = {
  now: () => number;
  advance: (ms: number) => void;
};

export const createClock = (start = START): TestClock => {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    }
  };
};

export const openTestDatabase = (): DatabaseClient => openDatabase({ path: ":memory:" });

export const makeEvent = (overrides: Partial<InboundEvent> = {}): InboundEvent => ({
  id: "evt-1",
  type: "issue",
  action: "opened",
  subject_id: "acme/widgets#1",
  payload_summary: "Crash when saving an empty form",
  received_at: START,
  ...overrides
});

export const makeAdmissionEvent = (overrides: Partial<AdmissionEvent> = {}): AdmissionEvent => ({
  ...makeEvent(),
  token_estimate: 100,
  ...overrides
});

/** Inserts pending records already assigned to a batch, ready to be claimed. */
export const seedAdmitted = (
  db: DatabaseClient,
  events: AdmissionEvent[],
  batchId: string,
  now: number
) => {
  for (const event of events) {
    insertPendingRecord(db, event, now);
    markAdmitted(db, event.id, batchId, now);
  }
};

export const testConfig = (raw: Record<string, unknown> = {}): EngineConfig =>
  parseEngineConfig(raw);

export type Respond = (
  events: AdmissionEvent[],
  options: ExecuteOptions
) => EngineOutcome[] | Promise<EngineOutcome[]>;

export type FakeEngine = ExecutionEngine & {
  calls: AdmissionEvent[][];
};

export const succeedAll =
  (cost = 1): Respond =>
  (events) =>
    events.map((event): EngineOutcome => ({
      event_id: event.id,
      status: "success",
      cost,
      tokens: 250
    }));

export const createFakeEngine = (
  respond: Respond = succeedAll(),
  mode: DispatchMode = "batch"
): FakeEngine => {
  const calls: AdmissionEvent[][] = [];
  return {
    mode,
    calls,
    execute: async (events, options) => {
      calls.push(events);
      return respond(events, options);
    }
  };
};

export type TestRuntimeOptions = {
  config?: EngineConfig;
  engine?: ExecutionEngine;
  clock?: TestClock;
  initialTokens?: number;
  logger?: Logger;
};

export const createTestRuntime = ({
  config = testConfig(),
  engine = createFakeEngine(),
  clock = createClock(),
  initialTokens = config.rateLimit.burst,
  logger = makeNoopLogger()
}: TestRuntimeOptions = {}): Runtime & { clock: TestClock } => {
  const runtime = createRuntime({
    db: openTestDatabase(),
    config,
    engine,
    logger,
    now: clock.now,
    initialTokens
  });
  return { ...runtime, clock };
};
