import type { NewUsageLogEntry, UsageLogEntry } from "../../domain/entities/usage-log-entry.js";
import type { UsageLogRepository } from "../../domain/repositories/usage-log-repository.js";

export class InMemoryUsageLogRepository implements UsageLogRepository {
  private readonly entries: UsageLogEntry[] = [];
  private nextId = 1;

  async appendMany(entries: readonly NewUsageLogEntry[]): Promise<void> {
    for (const entry of entries) {
      this.entries.push({ ...entry, id: this.nextId++ });
    }
  }

  async countForKey(apiKey: string): Promise<number> {
    return this.entries.filter((e) => e.apiKey === apiKey).length;
  }
}
