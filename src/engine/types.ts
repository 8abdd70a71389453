import type { DispatchMode } from "../config.js";
import type { AdmissionEvent, ModelState } from "../db/types.js";

export type EngineOutcome = {
  event_id: string;
  status: "success" | "failure";
  cost: number;
  tokens?: number;
  reason?: string;
  /** Stored and handed back on the event's next run while it is fresh. */
  state?: ModelState;
};

export type ExecuteOptions = {
  signal: AbortSignal;
  /** Fresh cached state, keyed by event id, for the events of this call that have one. */
  states: ReadonlyMap<string, ModelState>;
};

/**
 * The downstream executor. `batch` engines take a whole batch per call,
 * `per_event` engines are called once for every event.
 */
export type ExecutionEngine = {
  readonly mode: DispatchMode;
  execute: (events: AdmissionEvent[], options: ExecuteOptions) => Promise<EngineOutcome[]>;
};
