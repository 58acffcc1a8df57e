/**
 * Repository Interface: UsageLogRepository (ASYNC)
 *
 * Append-only. There is no update or delete path.
 */
import type { NewUsageLogEntry } from "../entities/usage-log-entry.js";

export interface UsageLogRepository {
  /** Append a batch of entries atomically. */
  appendMany(entries: readonly NewUsageLogEntry[]): Promise<void>;

  /** Number of entries recorded for a key digest. */
  countForKey(apiKey: string): Promise<number>;
}
