import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import { StoreUnavailableError } from "../errors.js";
import { SCHEMA_SQL, SCHEMA_VERSION } from "./schema.js";

export type DatabaseOptions = {
  path: string;
};

export type DatabaseClient = DatabaseType;

export const openDatabase = ({ path }: DatabaseOptions): DatabaseClient => {
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.exec(SCHEMA_SQL);

  const versionRow = db
    .prepare<[string], { value: string }>("SELECT value FROM metadata WHERE key = ?")
    .get("schema_version");
  const version = Number(versionRow?.value ?? SCHEMA_VERSION);
  if (version > SCHEMA_VERSION) {
    db.close();
    throw new Error(
      `Database ${path} has schema version ${version}; this build understands ${SCHEMA_VERSION}`
    );
  }

  db.prepare(
    `INSERT INTO metadata (key, value)
     VALUES (?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`
  ).run("schema_version", String(SCHEMA_VERSION));

  return db;
};

/**
 * Runs a store operation, turning SQLite failures (and use of a closed handle)
 * into {@link StoreUnavailableError}.
 */
export const withStore = <T>(db: DatabaseClient, operation: string, fn: () => T): T => {
  if (!db.open) {
    throw new StoreUnavailableError(`${operation}: database is closed`);
  }
  try {
    return fn();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      throw new StoreUnavailableError(`${operation}: ${error.message}`, { cause: error });
    }
    throw error;
  }
};
