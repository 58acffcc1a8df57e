import { hashApiKey } from "../auth/api-key-registry.js";
import { logger } from "../config/logger.js";
import type { NewUsageLogEntry } from "../domain/entities/usage-log-entry.js";
import type { UsageLogRepository } from "../domain/repositories/usage-log-repository.js";

export interface UsageRecorderOptions {
  /** How often the background consumer drains the queue. */
  flushIntervalMs?: number;
  /** Pending entries that trigger an immediate flush. */
  batchSize?: number;
  /** Queue bound; entries recorded past it are dropped. */
  maxPending?: number;
  now?: () => number;
}

/**
 * Fire-and-forget usage ledger.
 *
 * `record()` only enqueues; a timer-driven consumer appends batches to the
 * repository. Storage failures are logged and the batch is discarded; the
 * request that produced an entry has already been answered.
 */
export class UsageRecorder {
  private queue: NewUsageLogEntry[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  /** Tail of the serialized writes; `write` never rejects. */
  private writeChain: Promise<number> = Promise.resolve(0);
  private closed = false;
  private dropped = 0;
  private readonly batchSize: number;
  private readonly maxPending: number;
  private readonly now: () => number;

  constructor(
    private readonly repo: UsageLogRepository,
    opts: UsageRecorderOptions = {},
  ) {
    this.batchSize = opts.batchSize ?? 100;
    this.maxPending = opts.maxPending ?? 10_000;
    this.now = opts.now ?? Date.now;

    this.flushTimer = setInterval(() => void this.flush(), opts.flushIntervalMs ?? 1000);
    // Do not keep the process alive just for usage flushes.
    this.flushTimer.unref();
  }

  /** Enqueue one entry for `key` hitting `endpoint`. Never throws. */
  record(key: string, endpoint: string): void {
    try {
      if (this.closed) return;
      if (this.queue.length >= this.maxPending) {
        this.dropped++;
        if (this.dropped === 1 || this.dropped % 1000 === 0) {
          logger.warn("Usage log queue full; dropping entries", { dropped: this.dropped, maxPending: this.maxPending });
        }
        return;
      }
      this.queue.push({
        apiKey: hashApiKey(key),
        endpoint,
        timestampSeconds: Math.floor(this.now() / 1000),
      });
      if (this.queue.length >= this.batchSize) {
        void this.flush();
      }
    } catch (err) {
      logger.warn("Usage log record failed", { error: err instanceof Error ? err.message : String(err) });
    }
  }

  /**
   * Drain the queue into the repository. Resolves with the number of entries
   * written (0 on failure). Never rejects. Resolves only after every
   * earlier flush has finished writing.
   */
  async flush(): Promise<number> {
    const next = this.writeChain.then(() => {
      const batch = this.queue.splice(0);
      return batch.length === 0 ? 0 : this.write(batch);
    });
    this.writeChain = next;
    return next;
  }

  private async write(batch: NewUsageLogEntry[]): Promise<number> {
    try {
      await this.repo.appendMany(batch);
      return batch.length;
    } catch (err) {
      logger.warn("Usage log flush failed; discarding batch", {
        entries: batch.length,
        error: err instanceof Error ? err.message : String(err),
      });
      return 0;
    }
  }

  /** Entries waiting for the next flush. */
  get pending(): number {
    return this.queue.length;
  }

  /** Entries rejected because the queue was full. */
  get droppedCount(): number {
    return this.dropped;
  }

  /** Stop the consumer and write whatever is still queued. */
  async close(): Promise<void> {
    this.closed = true;
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  /** Number of recorded requests made with `key`. */
  countForKey(key: string): Promise<number> {
    return this.repo.countForKey(hashApiKey(key));
  }
}
