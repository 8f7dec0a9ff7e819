import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { initHistorySchema } from "./migrate.js";
import * as schema from "./schema/index.js";

export type Schema = typeof schema;

export type DrizzleDb = BetterSQLite3Database<Schema>;

export interface HistoryDb {
  /** Raw handle, owned by the caller, which closes it on shutdown. */
  sqlite: Database.Database;
  db: DrizzleDb;
}

/** Create a Drizzle database instance wrapping the given better-sqlite3 handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/**
 * Open the run history database at `file`, creating the file and its tables
 * when missing. History writes come from the host workers and the reconciler
 * while the API reads, so the file runs in WAL mode and writers wait up to
 * five seconds for the lock.
 */
export function openHistoryDb(file: string): HistoryDb {
  const sqlite = new Database(file);
  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("busy_timeout = 5000");
    initHistorySchema(sqlite);
  } catch (err) {
    sqlite.close();
    throw err;
  }
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
