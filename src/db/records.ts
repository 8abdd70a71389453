import type { DatabaseClient } from "./client.js";
import type { AdmissionEvent, EventType, ProcessingRecord, RecordStatus } from "./types.js";

export type InsertResult = {
  inserted: boolean;
  record: ProcessingRecord;
};

export type ListRecordsOptions = {
  status?: RecordStatus;
  type?: EventType;
  limit?: number;
};

const selectRecord = (db: DatabaseClient) =>
  db.prepare<[string], ProcessingRecord>("SELECT * FROM processing_records WHERE event_id = ?");

export const getRecord = (db: DatabaseClient, eventId: string): ProcessingRecord | null => {
  return selectRecord(db).get(eventId) ?? null;
};

const requireRecord = (db: DatabaseClient, eventId: string): ProcessingRecord => {
  const row = getRecord(db, eventId);
  if (!row) {
    throw new Error(`Processing record vanished: ${eventId}`);
  }
  return row;
};

/**
 * Inserts a pending record unless one already exists for the event id. The
 * primary key is the only serialization point between concurrent deliveries,
 * in this process or any other sharing the database file.
 */
export const insertPendingRecord = (
  db: DatabaseClient,
  event: AdmissionEvent,
  now: number
): InsertResult => {
  const result = db
    .prepare<[string, string, string, string, string, number, number, number, number]>(
      `INSERT INTO processing_records (
        event_id, event_type, action, subject_id, payload_summary, token_estimate,
        status, received_at, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, 'pending', ?, ?, ?)
      ON CONFLICT(event_id) DO NOTHING`
    )
    .run(
      event.id,
      event.type,
      event.action,
      event.subject_id,
      event.payload_summary,
      event.token_estimate,
      event.received_at,
      now,
      now
    );

  return { inserted: result.changes === 1, record: requireRecord(db, event.id) };
};

export const markAdmitted = (
  db: DatabaseClient,
  eventId: string,
  batchId: string,
  now: number
): boolean => {
  const result = db
    .prepare<[string, number, number, string]>(
      `UPDATE processing_records
       SET status = 'pending', batch_id = ?, admitted_at = ?, reason = NULL, updated_at = ?
       WHERE event_id = ? AND status IN ('pending', 'deferred')`
    )
    .run(batchId, now, now, eventId);
  return result.changes === 1;
};

export const markDeferred = (
  db: DatabaseClient,
  eventId: string,
  reason: string,
  now: number
): boolean => {
  const result = db
    .prepare<[string, number, string]>(
      `UPDATE processing_records
       SET status = 'deferred', reason = ?, batch_id = NULL, defer_count = defer_count + 1,
           updated_at = ?
       WHERE event_id = ? AND status IN ('pending', 'deferred')`
    )
    .run(reason, now, eventId);
  return result.changes === 1;
};

/** Moves the batch's pending records to in_flight and returns the ids this call won. */
export const claimForDispatch = (
  db: DatabaseClient,
  batchId: string,
  eventIds: string[],
  now: number
): string[] => {
  const stmt = db.prepare<[number, number, string, string]>(
    `UPDATE processing_records
     SET status = 'in_flight', dispatched_at = ?, updated_at = ?
     WHERE event_id = ? AND batch_id = ? AND status = 'pending'`
  );
  const claim = db.transaction((ids: string[]) =>
    ids.filter((id) => stmt.run(now, now, id, batchId).changes === 1)
  );
  return claim(eventIds);
};

export const completeRecord = (
  db: DatabaseClient,
  eventId: string,
  cost: number,
  tokens: number | null,
  now: number
): boolean => {
  const result = db
    .prepare<[number, number | null, number, number, string]>(
      `UPDATE processing_records
       SET status = 'completed', realized_cost = ?, realized_tokens = ?, completed_at = ?,
           reason = NULL, updated_at = ?
       WHERE event_id = ? AND status = 'in_flight'`
    )
    .run(cost, tokens, now, now, eventId);
  return result.changes === 1;
};

/** Oversized events fail straight from pending; everything else fails from in_flight. */
export const failRecord = (
  db: DatabaseClient,
  eventId: string,
  reason: string,
  now: number
): boolean => {
  const result = db
    .prepare<[string, number, number, string]>(
      `UPDATE processing_records
       SET status = 'failed', reason = ?, completed_at = ?, updated_at = ?
       WHERE event_id = ? AND status IN ('pending', 'in_flight')`
    )
    .run(reason, now, now, eventId);
  return result.changes === 1;
};

export const releaseRecords = (db: DatabaseClient, eventIds: string[], now: number): number => {
  const stmt = db.prepare<[number, string]>(
    `UPDATE processing_records
     SET status = 'pending', batch_id = NULL, dispatched_at = NULL, updated_at = ?
     WHERE event_id = ? AND status = 'in_flight'`
  );
  const release = db.transaction((ids: string[]) =>
    ids.reduce((count, id) => count + stmt.run(now, id).changes, 0)
  );
  return release(eventIds);
};

/** Windows do not survive a restart; their pending records become unbatched again. */
export const releaseOrphanedPending = (db: DatabaseClient, now: number): number => {
  return db
    .prepare<[number]>(
      `UPDATE processing_records
       SET batch_id = NULL, updated_at = ?
       WHERE status = 'pending' AND batch_id IS NOT NULL`
    )
    .run(now).changes;
};

export const reconcileInFlight = (
  db: DatabaseClient,
  options: { olderThan: number; now: number }
): string[] => {
  const reconcile = db.transaction(() => {
    const ids = db
      .prepare<[number], { event_id: string }>(
        `SELECT event_id FROM processing_records
         WHERE status = 'in_flight' AND COALESCE(dispatched_at, updated_at) < ?
         ORDER BY received_at ASC`
      )
      .all(options.olderThan)
      .map((row) => row.event_id);

    const stmt = db.prepare<[number, number, string]>(
      `UPDATE processing_records
       SET status = 'failed', reason = 'unconfirmed after restart', completed_at = ?,
           updated_at = ?
       WHERE event_id = ? AND status = 'in_flight'`
    );
    for (const id of ids) {
      stmt.run(options.now, options.now, id);
    }
    return ids;
  });

  return reconcile();
};

/** Explicit resubmission of a failed event; failures are never retried on their own. */
export const resubmitRecord = (
  db: DatabaseClient,
  eventId: string,
  now: number
): ProcessingRecord | null => {
  const result = db
    .prepare<[number, string]>(
      `UPDATE processing_records
       SET status = 'pending', reason = NULL, batch_id = NULL, admitted_at = NULL,
           dispatched_at = NULL, completed_at = NULL, updated_at = ?
       WHERE event_id = ? AND status = 'failed'`
    )
    .run(now, eventId);

  if (result.changes !== 1) {
    return null;
  }
  return getRecord(db, eventId);
};

export const listRecords = (
  db: DatabaseClient,
  options: ListRecordsOptions = {}
): ProcessingRecord[] => {
  const whereParts: string[] = [];
  const params: Array<string | number> = [];

  if (options.status) {
    whereParts.push("status = ?");
    params.push(options.status);
  }
  if (options.type) {
    whereParts.push("event_type = ?");
    params.push(options.type);
  }

  const where = whereParts.length ? `WHERE ${whereParts.join(" AND ")}` : "";
  params.push(options.limit ?? 100);

  return db
    .prepare<Array<string | number>, ProcessingRecord>(
      `SELECT * FROM processing_records ${where}
       ORDER BY received_at DESC, event_id DESC
       LIMIT ?`
    )
    .all(...params);
};

/** Deferred records and pending records that no window holds, oldest first. */
export const listReevaluable = (db: DatabaseClient, limit = 500): ProcessingRecord[] => {
  return db
    .prepare<[number], ProcessingRecord>(
      `SELECT * FROM processing_records
       WHERE status = 'deferred' OR (status = 'pending' AND batch_id IS NULL)
       ORDER BY received_at ASC, event_type ASC, event_id ASC
       LIMIT ?`
    )
    .all(limit);
};

export const countByStatus = (db: DatabaseClient): Record<RecordStatus, number> => {
  const counts: Record<RecordStatus, number> = {
    pending: 0,
    in_flight: 0,
    completed: 0,
    failed: 0,
    deferred: 0
  };
  const rows = db
    .prepare<[], { status: RecordStatus; count: number }>(
      "SELECT status, COUNT(*) AS count FROM processing_records GROUP BY status"
    )
    .all();
  for (const row of rows) {
    counts[row.status] = row.count;
  }
  return counts;
};

/** True when a deferred event of the same type arrived before this one. */
export const hasOlderDeferred = (
  db: DatabaseClient,
  type: EventType,
  receivedAt: number,
  eventId: string
): boolean => {
  const row = db
    .prepare<[EventType, number, number, string], { found: number }>(
      `SELECT 1 AS found FROM processing_records
       WHERE event_type = ? AND status = 'deferred'
         AND (received_at < ? OR (received_at = ? AND event_id < ?))
       LIMIT 1`
    )
    .get(type, receivedAt, receivedAt, eventId);
  return row !== undefined;
};

/** In-flight plus windowed work already held for a subject. */
export const countActiveForSubject = (db: DatabaseClient, subjectId: string): number => {
  const row = db
    .prepare<[string], { count: number }>(
      `SELECT COUNT(*) AS count FROM processing_records
       WHERE subject_id = ?
         AND (status = 'in_flight' OR (status = 'pending' AND batch_id IS NOT NULL))`
    )
    .get(subjectId);
  return row?.count ?? 0;
};

export const countStaleUnfinished = (db: DatabaseClient, olderThan: number): number => {
  const row = db
    .prepare<[number], { count: number }>(
      `SELECT COUNT(*) AS count FROM processing_records
       WHERE status IN ('pending', 'in_flight', 'deferred') AND received_at < ?`
    )
    .get(olderThan);
  return row?.count ?? 0;
};
