import type { ApiKey, NewApiKey } from "../../domain/entities/api-key.js";
import type { ApiKeyRepository } from "../../domain/repositories/api-key-repository.js";

export class InMemoryApiKeyRepository implements ApiKeyRepository {
  private readonly keys = new Map<string, ApiKey>();

  async insert(key: NewApiKey): Promise<void> {
    if (this.keys.has(key.keyHash)) {
      throw new Error(`Duplicate api key hash: ${key.keyHash}`);
    }
    this.keys.set(key.keyHash, { ...key, active: true });
  }

  async findByHash(keyHash: string): Promise<ApiKey | null> {
    const key = this.keys.get(keyHash);
    return key ? { ...key } : null;
  }

  async deactivate(keyHash: string): Promise<boolean> {
    const key = this.keys.get(keyHash);
    if (!key) return false;
    key.active = false;
    return true;
  }
}
