export const EVENT_TYPES = ["discussion", "issue", "pull_request"] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type RecordStatus = "pending" | "in_flight" | "completed" | "failed" | "deferred";

export const RECORD_STATUSES: readonly RecordStatus[] = [
  "pending",
  "in_flight",
  "completed",
  "failed",
  "deferred"
];

export type InboundEvent = {
  id: string;
  type: EventType;
  action: string;
  subject_id: string;
  payload_summary: string;
  received_at: number;
  token_estimate?: number;
};

export type AdmissionEvent = Omit<InboundEvent, "token_estimate"> & {
  token_estimate: number;
};

export type ProcessingRecord = {
  event_id: string;
  event_type: EventType;
  action: string;
  subject_id: string;
  payload_summary: string;
  token_estimate: number;
  status: RecordStatus;
  reason: string | null;
  batch_id: string | null;
  defer_count: number;
  received_at: number;
  created_at: number;
  updated_at: number;
  admitted_at: number | null;
  dispatched_at: number | null;
  completed_at: number | null;
  realized_cost: number | null;
  realized_tokens: number | null;
};

/** Opaque engine state for one event, stored as JSON. */
export type ModelState = Record<string, unknown>;

export type ModelStateRecord = {
  event_id: string;
  state: string;
  updated_at: number;
};

export type CostEntryRecord = {
  id: string;
  event_id: string | null;
  event_type: EventType;
  amount: number;
  tokens: number;
  timestamp: number;
};

export const isEventType = (value: string): value is EventType =>
  (EVENT_TYPES as readonly string[]).includes(value);

export const toAdmissionEvent = (record: ProcessingRecord): AdmissionEvent => ({
  id: record.event_id,
  type: record.event_type,
  action: record.action,
  subject_id: record.subject_id,
  payload_summary: record.payload_summary,
  received_at: record.received_at,
  token_estimate: record.token_estimate
});
