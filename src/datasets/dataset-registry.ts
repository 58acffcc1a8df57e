import type { DrizzleDb } from "../db/index.js";
import { type DatasetRecord, parseDatasetRecord } from "../domain/entities/dataset-record.js";
import { NotFoundError, ValidationError } from "../domain/errors.js";
import type { DatasetDocumentStore } from "../domain/repositories/document-store.js";
import type { SearchMirror } from "../domain/repositories/search-mirror.js";
import { DrizzleSearchMirror } from "../infrastructure/persistence/drizzle-search-mirror.js";
import { JsonDocumentStore } from "../infrastructure/persistence/json-document-store.js";
import { SyncEngine } from "./sync-engine.js";

export interface DatasetStats {
  count: number;
  /** `updated` of the most recent record, or null when none has one. */
  lastUpdated: string | null;
  /** Occurrences of each tag across all records. */
  tagCounts: Record<string, number>;
}

/**
 * Dataset operations over the authoritative document and its search mirror.
 *
 * Writes go to the document store, which syncs the mirror before resolving;
 * listing reads the document, keyword search reads the mirror.
 */
export class DatasetRegistry {
  constructor(
    private readonly store: DatasetDocumentStore,
    private readonly mirror: SearchMirror,
    private readonly syncEngine: SyncEngine,
  ) {}

  /**
   * Validate and store a record, replacing any record with the same id.
   * @throws ValidationError before anything is persisted
   */
  async upsert(input: unknown): Promise<DatasetRecord> {
    const record = parseDatasetRecord(input);
    await this.store.upsert(record);
    return record;
  }

  queryAll(): Promise<DatasetRecord[]> {
    return this.store.readAll();
  }

  queryLatest(n: number): Promise<DatasetRecord[]> {
    return this.store.queryLatest(n);
  }

  /** @throws NotFoundError */
  async get(id: string): Promise<DatasetRecord> {
    const record = await this.store.get(id);
    if (!record) throw new NotFoundError("Dataset", id);
    return record;
  }

  search(keyword: string, limit: number): DatasetRecord[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`, [
        { path: "limit", message: "must be >= 1" },
      ]);
    }
    return this.mirror.search(keyword, limit);
  }

  /** Re-mirror every document record. Run at startup and for recovery. */
  async rebuildAll(): Promise<number> {
    const records = await this.store.readAll();
    this.syncEngine.rebuildAll(records);
    return records.length;
  }

  async stats(): Promise<DatasetStats> {
    const records = await this.store.readAll();
    const [latest] = await this.store.queryLatest(1);
    const tagCounts = new Map<string, number>();
    for (const record of records) {
      for (const tag of record.tags) {
        tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
      }
    }
    return { count: records.length, lastUpdated: latest?.updated ?? null, tagCounts: Object.fromEntries(tagCounts) };
  }

  /** Rows currently in the search mirror. Used as a liveness probe. */
  mirroredCount(): number {
    return this.mirror.count();
  }
}

/** Wire a registry over a JSON document at `documentPath` and the given database. */
export function createDatasetRegistry(opts: { documentPath: string; db: DrizzleDb }): DatasetRegistry {
  const mirror = new DrizzleSearchMirror(opts.db);
  const syncEngine = new SyncEngine(mirror);
  const store = new JsonDocumentStore({ filePath: opts.documentPath, sync: syncEngine });
  return new DatasetRegistry(store, mirror, syncEngine);
}
