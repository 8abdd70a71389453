export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA synchronous = NORMAL;

CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS processing_records (
  event_id TEXT PRIMARY KEY,
  event_type TEXT NOT NULL,
  action TEXT NOT NULL,
  subject_id TEXT NOT NULL,
  payload_summary TEXT NOT NULL DEFAULT '',
  token_estimate INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  reason TEXT,
  batch_id TEXT,
  defer_count INTEGER NOT NULL DEFAULT 0,
  received_at INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  admitted_at INTEGER,
  dispatched_at INTEGER,
  completed_at INTEGER,
  realized_cost REAL,
  realized_tokens INTEGER
);

CREATE INDEX IF NOT EXISTS idx_records_status_received ON processing_records(status, received_at);
CREATE INDEX IF NOT EXISTS idx_records_type_status_received ON processing_records(event_type, status, received_at);
CREATE INDEX IF NOT EXISTS idx_records_subject_status ON processing_records(subject_id, status);
CREATE INDEX IF NOT EXISTS idx_records_batch ON processing_records(batch_id);
CREATE INDEX IF NOT EXISTS idx_records_completed_at ON processing_records(completed_at);

CREATE TABLE IF NOT EXISTS cost_entries (
  id TEXT PRIMARY KEY,
  event_id TEXT UNIQUE,
  event_type TEXT NOT NULL,
  amount REAL NOT NULL,
  tokens INTEGER NOT NULL DEFAULT 0,
  timestamp INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_cost_entries_timestamp ON cost_entries(timestamp);
CREATE INDEX IF NOT EXISTS idx_cost_entries_type_timestamp ON cost_entries(event_type, timestamp);

CREATE TABLE IF NOT EXISTS model_states (
  event_id TEXT PRIMARY KEY,
  state TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_model_states_updated_at ON model_states(updated_at);

CREATE TRIGGER IF NOT EXISTS cost_entries_append_only BEFORE UPDATE ON cost_entries BEGIN
  SELECT RAISE(ABORT, 'cost entries are append-only');
END;
`;
