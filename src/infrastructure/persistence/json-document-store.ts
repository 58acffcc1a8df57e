import { randomUUID } from "node:crypto";
import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type DatasetRecord, datasetRecordSchema } from "../../domain/entities/dataset-record.js";
import { StorageCorruptionError, ValidationError } from "../../domain/errors.js";
import type { DatasetDocumentStore, DocumentSync } from "../../domain/repositories/document-store.js";

export interface JsonDocumentStoreOptions {
  /** Path of the JSON document. Parent directories are created on demand. */
  filePath: string;
  /** Run after every successful write, inside the write lock. */
  sync?: DocumentSync;
}

/**
 * Dataset records persisted as one pretty-printed JSON array.
 *
 * Upserts are serialized through a promise chain so the whole
 * read→modify→write→sync sequence is exclusive per instance. Writes go to a
 * temp file first and are renamed into place, so readers never observe a
 * half-written document.
 */
export class JsonDocumentStore implements DatasetDocumentStore {
  private readonly filePath: string;
  private readonly sync: DocumentSync | undefined;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: JsonDocumentStoreOptions) {
    this.filePath = options.filePath;
    this.sync = options.sync;
  }

  async readAll(): Promise<DatasetRecord[]> {
    await this.ensureDocument();
    return this.load();
  }

  async upsert(record: DatasetRecord): Promise<void> {
    await this.withLock(async () => {
      await this.ensureDocument();
      const records = await this.load();

      const idx = records.findIndex((r) => r.id === record.id);
      if (idx !== -1) {
        records[idx] = record;
      } else {
        records.push(record);
      }

      await this.save(records);
      this.sync?.sync([record], records);
    });
  }

  async queryLatest(n: number): Promise<DatasetRecord[]> {
    if (!Number.isInteger(n) || n < 1) {
      throw new ValidationError(`n must be a positive integer, got ${n}`, [{ path: "n", message: "must be >= 1" }]);
    }
    const records = await this.readAll();
    // Array.prototype.sort is stable: ties keep document order
    return records.sort(compareUpdatedDesc).slice(0, n);
  }

  async get(id: string): Promise<DatasetRecord | null> {
    const records = await this.readAll();
    return records.find((r) => r.id === id) ?? null;
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.writeChain;
    let release: () => void = () => {};
    this.writeChain = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async ensureDocument(): Promise<void> {
    if (existsSync(this.filePath)) return;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      // "wx" so a document created concurrently is never clobbered
      await fs.writeFile(this.filePath, "[]\n", { encoding: "utf-8", flag: "wx" });
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
    }
  }

  private async load(): Promise<DatasetRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      throw new StorageCorruptionError(this.filePath, "read failed", { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StorageCorruptionError(this.filePath, "invalid JSON", { cause: err });
    }

    if (!Array.isArray(parsed)) {
      throw new StorageCorruptionError(this.filePath, "top-level value is not an array");
    }

    const records: DatasetRecord[] = [];
    for (const [i, item] of parsed.entries()) {
      const result = datasetRecordSchema.safeParse(item);
      if (!result.success) {
        throw new StorageCorruptionError(this.filePath, `entry ${i} is not a valid dataset record`, {
          cause: result.error,
        });
      }
      records.push(result.data);
    }
    return records;
  }

  private async save(records: DatasetRecord[]): Promise<void> {
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, `${JSON.stringify(records, null, 2)}\n`, "utf-8");
    try {
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }
}

/** Descending by `updated`; records without one sort as "" (last). */
function compareUpdatedDesc(a: DatasetRecord, b: DatasetRecord): number {
  const ka = a.updated ?? "";
  const kb = b.updated ?? "";
  if (ka < kb) return 1;
  if (ka > kb) return -1;
  return 0;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
