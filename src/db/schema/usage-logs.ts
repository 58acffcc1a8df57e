import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/** Append-only request ledger for authenticated calls. */
export const usageLogs = sqliteTable(
  "usage_logs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    /** SHA-256 hex digest of the API key */
    apiKey: text("api_key").notNull(),
    endpoint: text("endpoint").notNull(),
    /** Unix seconds */
    ts: integer("ts").notNull(),
  },
  (table) => [index("idx_usage_logs_key").on(table.apiKey, table.ts)],
);
