import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { MarketDataSource } from './market-data.source';
import { PriceCacheService } from './price-cache.service';

// Get-or-fetch-and-populate over the price cache.
// Absent quotes are never cached, so a flaky provider is retried on the next call.
@Injectable()
export class PriceService {
  constructor(
    private readonly cache: PriceCacheService,
    private readonly source: MarketDataSource,
  ) {}

  /**
   * Current price for a ticker.
   * A cache hit returns without calling the provider unless forceRefresh is set.
   */
  async getPrice(ticker: string, forceRefresh = false): Promise<Decimal | undefined> {
    const symbol = ticker.toUpperCase();

    if (!forceRefresh) {
      const cached = await this.cache.get(symbol);
      if (cached) {
        return cached;
      }
    }

    const price = await this.source.fetchPrice(symbol);
    if (price === undefined) {
      return undefined;
    }

    await this.cache.set(symbol, price);
    return price;
  }
}
