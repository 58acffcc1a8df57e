/** An issued API key. The raw token is never part of the stored entity. */
export interface ApiKey {
  /** SHA-256 hex digest of the raw token. */
  keyHash: string;
  label: string;
  /** ISO-8601 issuance time. */
  createdAt: string;
  active: boolean;
  /** Requests allowed for this key; null means unlimited. Stored, not enforced. */
  quota: number | null;
}

export interface NewApiKey {
  keyHash: string;
  label: string;
  createdAt: string;
  quota: number | null;
}
