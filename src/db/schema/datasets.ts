import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Search mirror of the dataset document. Derived data: rebuilt from
 * datasets.json on startup, upserted on every write.
 */
export const datasets = sqliteTable(
  "datasets",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    url: text("url").notNull(),
    /** ISO-8601 string as supplied by the caller */
    updated: text("updated"),
    rows: integer("rows"),
    /** JSON-serialized string[] */
    columns: text("columns"),
    description: text("description"),
    /** JSON-serialized string[], searched as text */
    tags: text("tags"),
  },
  (table) => [index("idx_datasets_updated").on(table.updated)],
);
