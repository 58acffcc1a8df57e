import { asc, count, or, type SQL, sql } from "drizzle-orm";
import type { AnySQLiteColumn } from "drizzle-orm/sqlite-core";
import type { DrizzleDb } from "../../db/index.js";
import { initDatasetsTable } from "../../db/migrate.js";
import { datasets } from "../../db/schema/index.js";
import type { DatasetRecord } from "../../domain/entities/dataset-record.js";
import type { SearchMirror } from "../../domain/repositories/search-mirror.js";

type DatasetRow = typeof datasets.$inferSelect;

/** Escape LIKE metacharacters so the keyword matches literally. Pairs with `ESCAPE '\'`. */
export function escapeLikePattern(keyword: string): string {
  return keyword.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** SQLite LIKE: case-insensitive for ASCII letters, case-sensitive beyond. */
function containsIgnoringCase(column: AnySQLiteColumn, pattern: string): SQL {
  return sql`${column} LIKE ${pattern} ESCAPE '\\'`;
}

export class DrizzleSearchMirror implements SearchMirror {
  constructor(private readonly db: DrizzleDb) {}

  ensureSchema(): void {
    initDatasetsTable(this.db.$client);
  }

  upsertMany(records: readonly DatasetRecord[]): void {
    if (records.length === 0) return;
    this.db.transaction((tx) => {
      for (const record of records) {
        const row = toRow(record);
        tx.insert(datasets)
          .values(row)
          .onConflictDoUpdate({
            target: datasets.id,
            set: {
              name: row.name,
              url: row.url,
              updated: row.updated,
              rows: row.rows,
              columns: row.columns,
              description: row.description,
              tags: row.tags,
            },
          })
          .run();
      }
    });
  }

  search(keyword: string, limit: number): DatasetRecord[] {
    const pattern = `%${escapeLikePattern(keyword)}%`;
    const rows = this.db
      .select()
      .from(datasets)
      .where(
        or(
          containsIgnoringCase(datasets.name, pattern),
          containsIgnoringCase(datasets.description, pattern),
          containsIgnoringCase(datasets.tags, pattern),
        ),
      )
      .orderBy(asc(datasets.id))
      .limit(limit)
      .all();
    return rows.map(toRecord);
  }

  count(): number {
    const result = this.db.select({ count: count() }).from(datasets).get();
    return result?.count ?? 0;
  }
}

function toRow(record: DatasetRecord): DatasetRow {
  return {
    id: record.id,
    name: record.name,
    url: record.url,
    updated: record.updated ?? null,
    rows: record.rows ?? null,
    columns: record.columns !== undefined ? JSON.stringify(record.columns) : null,
    description: record.description ?? null,
    tags: JSON.stringify(record.tags),
  };
}

/** Inverse of `toRow`: null columns become absent fields, JSON text becomes arrays again. */
function toRecord(row: DatasetRow): DatasetRecord {
  const record: DatasetRecord = {
    id: row.id,
    name: row.name,
    url: row.url,
    tags: parseStringArray(row.tags) ?? [],
  };
  if (row.updated !== null) record.updated = row.updated;
  if (row.rows !== null) record.rows = row.rows;
  const columns = parseStringArray(row.columns);
  if (columns !== null) record.columns = columns;
  if (row.description !== null) record.description = row.description;
  return record;
}

function parseStringArray(raw: string | null): string[] | null {
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  return parsed.filter((v): v is string => typeof v === "string");
}
