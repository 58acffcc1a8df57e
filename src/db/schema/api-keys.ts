import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const apiKeys = sqliteTable("api_keys", {
  /** SHA-256 hex digest of the raw key. Raw key is NEVER stored. */
  keyHash: text("key_hash").primaryKey(),
  label: text("label").notNull().default(""),
  /** ISO timestamp of issuance */
  createdAt: text("created_at").notNull(),
  active: integer("active", { mode: "boolean" }).notNull().default(true),
  /** Null = unlimited */
  quota: integer("quota"),
});
