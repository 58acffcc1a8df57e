/**
 * Repository Interface: SearchMirror (SYNC)
 *
 * Derived relational copy of the document store used for keyword search.
 * Never authoritative; can be rebuilt from the document at any time.
 */
import type { DatasetRecord } from "../entities/dataset-record.js";

export interface SearchMirror {
  /** Create the backing table if it does not exist. */
  ensureSchema(): void;

  /** Insert-or-replace each record by id, atomically as one batch. */
  upsertMany(records: readonly DatasetRecord[]): void;

  /**
   * Records whose name, description or tags contain `keyword`
   * (ASCII case-insensitive), ordered by id, at most `limit`.
   */
  search(keyword: string, limit: number): DatasetRecord[];

  /** Number of mirrored rows. */
  count(): number;
}
