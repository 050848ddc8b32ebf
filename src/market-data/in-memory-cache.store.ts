import { Injectable } from '@nestjs/common';
import { CacheConnector, CacheStore } from './cache-store';

interface CacheEntry {
  value: string;
  expiresAt: number; // epoch ms
}

export type Clock = () => number;

/**
 * Client handle over a shared entry map.
 * Expired entries are dropped lazily on read.
 */
export class InMemoryCacheStore extends CacheStore {
  private closed = false;

  constructor(
    private readonly entries: Map<string, CacheEntry>,
    private readonly now: Clock,
  ) {
    super();
  }

  async get(key: string): Promise<string | null> {
    this.assertOpen();
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertOpen();
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Cache connection is closed');
    }
  }
}

// In-process backend: every connection sees the same key space.
@Injectable()
export class InMemoryCacheConnector extends CacheConnector {
  private readonly entries = new Map<string, CacheEntry>();
  private now: Clock = () => Date.now();

  async connect(): Promise<InMemoryCacheStore> {
    return new InMemoryCacheStore(this.entries, () => this.now());
  }

  /** Replaces the time source - test harness only */
  useClock(clock: Clock): void {
    this.now = clock;
  }
}
