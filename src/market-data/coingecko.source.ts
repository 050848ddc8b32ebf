import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { toDecimal } from '../common/utils/decimal.util';
import { MarketDataSource } from './market-data.source';
import { toProviderId } from './ticker-map';

// { "bitcoin": { "usd": 50000 } }
const simplePriceSchema = z.record(z.string(), z.record(z.string(), z.number().finite()));

@Injectable()
export class CoinGeckoMarketDataSource extends MarketDataSource {
  private readonly logger = new Logger(CoinGeckoMarketDataSource.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    super();
  }

  async fetchPrice(ticker: string): Promise<Decimal | undefined> {
    const coinId = toProviderId(ticker);
    if (!coinId) {
      return undefined;
    }

    const currency = this.config.quoteCurrency;
    const url = new URL(`${this.config.marketDataBaseUrl}/simple/price`);
    url.searchParams.set('ids', coinId);
    url.searchParams.set('vs_currencies', currency);

    try {
      const response = await fetch(url.toString(), {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.marketDataTimeoutMs),
      });

      if (!response.ok) {
        await response.body?.cancel();
        this.logger.warn(`Quote request for ${ticker} failed: HTTP ${response.status}`);
        return undefined;
      }

      const parsed = simplePriceSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn(`Malformed quote response for ${ticker}`);
        return undefined;
      }

      const price = parsed.data[coinId]?.[currency];
      return price === undefined ? undefined : toDecimal(price);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error fetching price for ${ticker}: ${reason}`);
      return undefined;
    }
  }
}
