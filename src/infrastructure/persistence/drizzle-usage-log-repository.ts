import { count, eq } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { usageLogs } from "../../db/schema/index.js";
import type { NewUsageLogEntry } from "../../domain/entities/usage-log-entry.js";
import type { UsageLogRepository } from "../../domain/repositories/usage-log-repository.js";

export class DrizzleUsageLogRepository implements UsageLogRepository {
  constructor(private readonly db: DrizzleDb) {}

  async appendMany(entries: readonly NewUsageLogEntry[]): Promise<void> {
    if (entries.length === 0) return;
    this.db
      .insert(usageLogs)
      .values(entries.map((e) => ({ apiKey: e.apiKey, endpoint: e.endpoint, ts: e.timestampSeconds })))
      .run();
  }

  async countForKey(apiKey: string): Promise<number> {
    const result = this.db.select({ count: count() }).from(usageLogs).where(eq(usageLogs.apiKey, apiKey)).get();
    return result?.count ?? 0;
  }
}
