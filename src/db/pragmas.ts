import type Database from "better-sqlite3";

/**
 * Apply the registry's pragmas to a SQLite handle.
 *
 * - journal_mode = WAL: concurrent readers alongside the single writer
 * - busy_timeout = 5000: wait up to 5 seconds for write locks instead of
 *   failing immediately with SQLITE_BUSY
 */
export function applyDatabasePragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
}
