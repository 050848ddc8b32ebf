/**
 * Connection to a string key-value store with per-key expiry.
 * Single-key reads and writes only; no transactions.
 */
export abstract class CacheStore {
  /** Resolves null for a missing or expired key. */
  abstract get(key: string): Promise<string | null>;

  abstract set(key: string, value: string, ttlSeconds: number): Promise<void>;

  abstract close(): Promise<void>;
}

/** Opens cache connections. Each caller owns and closes what it opens. */
export abstract class CacheConnector {
  abstract connect(): Promise<CacheStore>;
}
