/** One row of the append-only usage ledger. */
export interface UsageLogEntry {
  id: number;
  /** SHA-256 hex digest of the API key that made the request. */
  apiKey: string;
  endpoint: string;
  /** Unix time in whole seconds. */
  timestampSeconds: number;
}

export type NewUsageLogEntry = Omit<UsageLogEntry, "id">;
