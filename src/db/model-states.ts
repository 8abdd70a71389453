import { z } from "zod";
import type { DatabaseClient } from "./client.js";
import type { ModelState, ModelStateRecord } from "./types.js";

const stateSchema = z.record(z.unknown());

export type StateLookup = {
  now: number;
  maxAgeMs: number;
};

export const saveModelState = (
  db: DatabaseClient,
  eventId: string,
  state: ModelState,
  now: number
): void => {
  db.prepare<[string, string, number]>(
    `INSERT INTO model_states (event_id, state, updated_at)
     VALUES (?, ?, ?)
     ON CONFLICT(event_id) DO UPDATE SET
       state = excluded.state,
       updated_at = excluded.updated_at`
  ).run(eventId, JSON.stringify(state), now);
};

const parseState = (raw: string): ModelState | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // unreadable entries are cache misses; the next save replaces them
    return null;
  }
  const result = stateSchema.safeParse(parsed);
  return result.success ? result.data : null;
};

/** Cached state for the event, or null when there is none or it is older than `maxAgeMs`. */
export const getModelState = (
  db: DatabaseClient,
  eventId: string,
  { now, maxAgeMs }: StateLookup
): ModelState | null => {
  const row = db
    .prepare<[string], ModelStateRecord>("SELECT * FROM model_states WHERE event_id = ?")
    .get(eventId);
  if (!row || row.updated_at < now - maxAgeMs) {
    return null;
  }
  return parseState(row.state);
};

export const getModelStates = (
  db: DatabaseClient,
  eventIds: string[],
  lookup: StateLookup
): Map<string, ModelState> => {
  const states = new Map<string, ModelState>();
  for (const eventId of eventIds) {
    const state = getModelState(db, eventId, lookup);
    if (state) {
      states.set(eventId, state);
    }
  }
  return states;
};
