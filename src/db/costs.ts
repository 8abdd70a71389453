import { ulid } from "ulid";
import type { DatabaseClient } from "./client.js";
import type { CostEntryRecord, EventType } from "./types.js";

export type NewCostEntry = {
  eventId?: string | null;
  eventType: EventType;
  amount: number;
  tokens?: number;
  timestamp: number;
};

export type EventTypeStats = {
  event_type: EventType;
  count: number;
  total_cost: number;
  total_tokens: number;
};

export const appendCostEntry = (db: DatabaseClient, input: NewCostEntry): CostEntryRecord => {
  const entry: CostEntryRecord = {
    id: ulid(input.timestamp),
    event_id: input.eventId ?? null,
    event_type: input.eventType,
    amount: input.amount,
    tokens: input.tokens ?? 0,
    timestamp: input.timestamp
  };

  db.prepare<[string, string | null, EventType, number, number, number]>(
    `INSERT INTO cost_entries (id, event_id, event_type, amount, tokens, timestamp)
     VALUES (?, ?, ?, ?, ?, ?)`
  ).run(entry.id, entry.event_id, entry.event_type, entry.amount, entry.tokens, entry.timestamp);

  return entry;
};

export const sumCostsSince = (db: DatabaseClient, since: number): number => {
  const row = db
    .prepare<[number], { total: number | null }>(
      "SELECT SUM(amount) AS total FROM cost_entries WHERE timestamp >= ?"
    )
    .get(since);
  return row?.total ?? 0;
};

export const sumCostsTotal = (db: DatabaseClient): number => {
  const row = db
    .prepare<[], { total: number | null }>("SELECT SUM(amount) AS total FROM cost_entries")
    .get();
  return row?.total ?? 0;
};

export const sumCostsByTypeSince = (
  db: DatabaseClient,
  since: number
): Array<{ event_type: EventType; total: number }> => {
  return db
    .prepare<[number], { event_type: EventType; total: number }>(
      `SELECT event_type, SUM(amount) AS total FROM cost_entries
       WHERE timestamp >= ?
       GROUP BY event_type
       ORDER BY event_type ASC`
    )
    .all(since);
};

/** Per-type totals of records completed since the given time. */
export const eventStatsSince = (
  db: DatabaseClient,
  since: number,
  type?: EventType
): EventTypeStats[] => {
  const params: Array<string | number> = [since];
  let typeFilter = "";
  if (type) {
    typeFilter = "AND event_type = ?";
    params.push(type);
  }

  return db
    .prepare<Array<string | number>, EventTypeStats>(
      `SELECT event_type,
              COUNT(*) AS count,
              COALESCE(SUM(realized_cost), 0) AS total_cost,
              COALESCE(SUM(realized_tokens), 0) AS total_tokens
       FROM processing_records
       WHERE status = 'completed' AND completed_at >= ? ${typeFilter}
       GROUP BY event_type
       ORDER BY event_type ASC`
    )
    .all(...params);
};

export const listCostEntries = (db: DatabaseClient, limit = 100): CostEntryRecord[] => {
  return db
    .prepare<[number], CostEntryRecord>(
      "SELECT * FROM cost_entries ORDER BY timestamp DESC, id DESC LIMIT ?"
    )
    .all(limit);
};
