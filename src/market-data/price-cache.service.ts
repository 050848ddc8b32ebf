import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PRICE_CACHE_TTL } from '../config/app-config';
import { parseDecimal } from '../common/utils/decimal.util';
import { CacheStore } from './cache-store';

export const PRICE_KEY_PREFIX = 'price:';

export function priceCacheKey(ticker: string): string {
  return `${PRICE_KEY_PREFIX}${ticker.toUpperCase()}`;
}

/**
 * Ticker -> last known price, expiring after the configured TTL.
 * A miss is a normal undefined result; store faults propagate.
 */
@Injectable()
export class PriceCacheService {
  private readonly logger = new Logger(PriceCacheService.name);

  constructor(
    private readonly store: CacheStore,
    @Inject(PRICE_CACHE_TTL) private readonly ttlSeconds: number,
  ) {}

  async get(ticker: string): Promise<Decimal | undefined> {
    const key = priceCacheKey(ticker);
    const raw = await this.store.get(key);
    if (raw === null) {
      return undefined;
    }

    const price = parseDecimal(raw);
    if (!price) {
      this.logger.warn(`Ignoring unparseable cached value "${raw}" under ${key}`);
    }
    return price;
  }

  /** Last write wins for concurrent writers of the same ticker */
  async set(ticker: string, price: Decimal, ttlSeconds: number = this.ttlSeconds): Promise<void> {
    await this.store.set(priceCacheKey(ticker), price.toString(), ttlSeconds);
  }
}
