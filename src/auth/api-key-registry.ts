import { createHash, randomBytes } from "node:crypto";
import { ValidationError } from "../domain/errors.js";
import type { ApiKeyRepository } from "../domain/repositories/api-key-repository.js";

/** 32 bytes = 256 bits of entropy per token. */
const TOKEN_BYTES = 32;

/** SHA-256 hex digest used to store and look up a raw token. */
export function hashApiKey(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

export interface CreateKeyOptions {
  label?: string;
  /** Requests allowed; omit or null for unlimited. */
  quota?: number | null;
}

/**
 * Issues and checks API keys.
 *
 * Only the SHA-256 digest of a token is persisted, so `createKey` is the one
 * place a raw token is ever visible.
 */
export class ApiKeyRegistry {
  constructor(
    private readonly repo: ApiKeyRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Issue a new active key and return the raw token. */
  async createKey(opts: CreateKeyOptions = {}): Promise<string> {
    const quota = opts.quota ?? null;
    if (quota !== null && (!Number.isInteger(quota) || quota < 0)) {
      throw new ValidationError(`quota must be a non-negative integer, got ${quota}`, [
        { path: "quota", message: "must be a non-negative integer" },
      ]);
    }

    const token = randomBytes(TOKEN_BYTES).toString("base64url");
    await this.repo.insert({
      keyHash: hashApiKey(token),
      label: opts.label ?? "",
      createdAt: this.now().toISOString(),
      quota,
    });
    return token;
  }

  /** True iff the token was issued and is still active. Empty tokens skip the lookup. */
  async validateKey(token: string | null | undefined): Promise<boolean> {
    if (!token) return false;
    const key = await this.repo.findByHash(hashApiKey(token));
    return key?.active === true;
  }

  /** Idempotent; unknown tokens are ignored. */
  async deactivateKey(token: string): Promise<void> {
    if (!token) return;
    await this.repo.deactivate(hashApiKey(token));
  }
}
