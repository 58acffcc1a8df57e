/**
 * Repository Interface: ApiKeyRepository (ASYNC)
 *
 * Keys are addressed by the SHA-256 digest of the raw token.
 */
import type { ApiKey, NewApiKey } from "../entities/api-key.js";

export interface ApiKeyRepository {
  /** Store a new active key. */
  insert(key: NewApiKey): Promise<void>;

  /** Get a key by digest. Returns null if never issued. */
  findByHash(keyHash: string): Promise<ApiKey | null>;

  /**
   * Mark a key inactive. Returns true if a row matched.
   * Unknown digests are not an error.
   */
  deactivate(keyHash: string): Promise<boolean>;
}
