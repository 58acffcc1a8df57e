import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { initRegistrySchema } from "./migrate.js";
import { applyDatabasePragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Drizzle handle over better-sqlite3. Repositories accept this type. */
export type DrizzleDb = BetterSQLite3Database<Schema> & { $client: Database.Database };

/** Wrap an open better-sqlite3 handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/**
 * Open (creating if needed) the registry database at `path`, apply pragmas
 * and make sure every table exists. `":memory:"` is accepted for tests.
 */
export function openDatabase(path: string): { sqlite: Database.Database; db: DrizzleDb } {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  applyDatabasePragmas(sqlite);
  initRegistrySchema(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
export { applyDatabasePragmas } from "./pragmas.js";
