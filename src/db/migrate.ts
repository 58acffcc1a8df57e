import type Database from "better-sqlite3";

/**
 * Create the registry tables and indexes if they do not exist.
 *
 * Every statement is idempotent; safe to run on every startup and on a
 * database another process already initialized.
 */
export function initRegistrySchema(sqlite: Database.Database): void {
  initDatasetsTable(sqlite);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS api_keys (
      key_hash TEXT PRIMARY KEY,
      label TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      active INTEGER NOT NULL DEFAULT 1,
      quota INTEGER DEFAULT NULL
    )
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS usage_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      api_key TEXT NOT NULL,
      endpoint TEXT NOT NULL,
      ts INTEGER NOT NULL
    )
  `);
  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_usage_logs_key ON usage_logs(api_key, ts)");
}

/** The search mirror table alone. Used by the mirror's own schema bootstrap. */
export function initDatasetsTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS datasets (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      url TEXT NOT NULL,
      updated TEXT,
      rows INTEGER,
      columns TEXT,
      description TEXT,
      tags TEXT
    )
  `);
  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_datasets_updated ON datasets(updated)");
}
