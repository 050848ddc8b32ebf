import { Inject, Injectable, Logger } from '@nestjs/common';
import { PRICE_CACHE_TTL } from '../config/app-config';
import { AlertRepository } from '../alerts/alert.repository';
import { AlertEvaluatorService } from '../alerts/alert-evaluator.service';
import { CacheConnector } from '../market-data/cache-store';
import { MarketDataSource } from '../market-data/market-data.source';
import { PriceCacheService } from '../market-data/price-cache.service';
import { PriceService } from '../market-data/price.service';
import { NotificationSink } from '../notifications/notification.sink';
import { PortfolioRepository } from '../portfolio/portfolio.repository';

export interface PriceRefreshResult {
  tickers: number;
  refreshed: number;
  triggered: number;
}

/**
 * Refreshes every ticker anyone holds or watches, then evaluates alerts
 * against the fresh cache. Runs on a cache connection of its own.
 */
@Injectable()
export class PriceRefreshJob {
  private readonly logger = new Logger(PriceRefreshJob.name);

  constructor(
    private readonly portfolios: PortfolioRepository,
    private readonly alerts: AlertRepository,
    private readonly connector: CacheConnector,
    private readonly source: MarketDataSource,
    private readonly notifier: NotificationSink,
    @Inject(PRICE_CACHE_TTL) private readonly ttlSeconds: number,
  ) {}

  async run(): Promise<PriceRefreshResult> {
    const store = await this.connector.connect();
    try {
      const cache = new PriceCacheService(store, this.ttlSeconds);
      const prices = new PriceService(cache, this.source);
      const evaluator = new AlertEvaluatorService(this.alerts, cache, this.notifier);

      const [held, watched] = await Promise.all([
        this.portfolios.findDistinctTickers(),
        this.alerts.findActiveTickers(),
      ]);
      const tickers = Array.from(new Set([...held, ...watched]));

      const results = await Promise.all(tickers.map((ticker) => prices.getPrice(ticker, true)));
      const refreshed = results.filter((price) => price !== undefined).length;

      const triggered = await evaluator.evaluateActive();

      this.logger.log(`Refreshed ${refreshed}/${tickers.length} prices, ${triggered} alerts triggered`);
      return { tickers: tickers.length, refreshed, triggered };
    } finally {
      await store.close();
    }
  }
}
