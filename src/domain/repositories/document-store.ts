/**
 * Repository Interface: DatasetDocumentStore (ASYNC)
 *
 * The authoritative collection of dataset records. Full-read/full-write:
 * every mutation rewrites the whole document.
 */
import type { DatasetRecord } from "../entities/dataset-record.js";

/**
 * Reconciles a secondary copy after a document mutation.
 * Runs inside the store's write lock; a throw fails the mutation's caller.
 */
export interface DocumentSync {
  /**
   * @param changed - records written by this mutation
   * @param document - the full document as just persisted
   */
  sync(changed: readonly DatasetRecord[], document: readonly DatasetRecord[]): void;
}

export interface DatasetDocumentStore {
  /**
   * Every record in document order. Bootstraps an empty document when none exists.
   * @throws StorageCorruptionError when the document cannot be parsed
   */
  readAll(): Promise<DatasetRecord[]>;

  /**
   * Replace the record with the same id in place, or append it.
   * Persists the document and runs the registered sync before resolving.
   */
  upsert(record: DatasetRecord): Promise<void>;

  /** The `n` most recently updated records; missing `updated` sorts last. */
  queryLatest(n: number): Promise<DatasetRecord[]>;

  /** Look up one record by id. Returns null if absent. */
  get(id: string): Promise<DatasetRecord | null>;
}
