import { eq } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { apiKeys } from "../../db/schema/index.js";
import type { ApiKey, NewApiKey } from "../../domain/entities/api-key.js";
import type { ApiKeyRepository } from "../../domain/repositories/api-key-repository.js";

export class DrizzleApiKeyRepository implements ApiKeyRepository {
  constructor(private readonly db: DrizzleDb) {}

  async insert(key: NewApiKey): Promise<void> {
    this.db
      .insert(apiKeys)
      .values({
        keyHash: key.keyHash,
        label: key.label,
        createdAt: key.createdAt,
        active: true,
        quota: key.quota,
      })
      .run();
  }

  async findByHash(keyHash: string): Promise<ApiKey | null> {
    const row = this.db.select().from(apiKeys).where(eq(apiKeys.keyHash, keyHash)).get();
    if (!row) return null;
    return {
      keyHash: row.keyHash,
      label: row.label,
      createdAt: row.createdAt,
      active: row.active,
      quota: row.quota,
    };
  }

  async deactivate(keyHash: string): Promise<boolean> {
    const result = this.db.update(apiKeys).set({ active: false }).where(eq(apiKeys.keyHash, keyHash)).run();
    return result.changes > 0;
  }
}
