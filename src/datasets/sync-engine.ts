import { logger } from "../config/logger.js";
import type { DatasetRecord } from "../domain/entities/dataset-record.js";
import type { DocumentSync } from "../domain/repositories/document-store.js";
import type { SearchMirror } from "../domain/repositories/search-mirror.js";

/**
 * Pushes document-store writes into the search mirror.
 *
 * Normal writes upsert only the changed records. A failed push leaves the
 * mirror behind the document, so the engine turns dirty and the next sync
 * replays the whole document before it reports success.
 */
export class SyncEngine implements DocumentSync {
  private dirty = false;

  constructor(private readonly mirror: SearchMirror) {}

  /** True while the mirror may be missing writes the document already has. */
  get isDirty(): boolean {
    return this.dirty;
  }

  sync(changed: readonly DatasetRecord[], document: readonly DatasetRecord[]): void {
    if (this.dirty) {
      this.rebuildAll(document);
      return;
    }
    try {
      this.mirror.upsertMany(changed);
    } catch (err) {
      this.dirty = true;
      logger.error("Search mirror sync failed; next write will rebuild", {
        ids: changed.map((r) => r.id),
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /**
   * Create the mirror schema if needed and upsert every record.
   * Rows whose id is no longer in `document` are left in place.
   */
  rebuildAll(document: readonly DatasetRecord[]): void {
    try {
      this.mirror.ensureSchema();
      this.mirror.upsertMany(document);
    } catch (err) {
      this.dirty = true;
      logger.error("Search mirror rebuild failed", {
        records: document.length,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
    this.dirty = false;
    logger.debug("Search mirror rebuilt", { records: document.length });
  }
}
