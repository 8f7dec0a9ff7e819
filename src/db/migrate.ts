import type Database from "better-sqlite3";

/** Create the run history table and its index. Safe to call on every boot. */
export function initHistorySchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS containers (
      id TEXT PRIMARY KEY,
      image_name TEXT NOT NULL,
      host TEXT NOT NULL,
      name TEXT NOT NULL,
      status TEXT NOT NULL,
      created_at TEXT NOT NULL,
      finished_at TEXT,
      updated_at TEXT NOT NULL
    )
  `);

  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_containers_image ON containers(image_name, created_at)");
}
