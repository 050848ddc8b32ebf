import { Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { CacheConnector, CacheStore } from './cache-store';
import { InMemoryCacheConnector } from './in-memory-cache.store';
import { MarketDataSource } from './market-data.source';
import { CoinGeckoMarketDataSource } from './coingecko.source';
import { PriceCacheService } from './price-cache.service';
import { PriceService } from './price.service';
import { MarketDataController } from './market-data.controller';

@Module({
  controllers: [MarketDataController],
  providers: [
    { provide: CacheConnector, useClass: InMemoryCacheConnector },
    {
      // long-lived connection for the request path
      provide: CacheStore,
      useFactory: (connector: CacheConnector): Promise<CacheStore> => connector.connect(),
      inject: [CacheConnector],
    },
    { provide: MarketDataSource, useClass: CoinGeckoMarketDataSource },
    PriceCacheService,
    PriceService,
  ],
  exports: [CacheConnector, MarketDataSource, PriceCacheService, PriceService],
})
export class MarketDataModule implements OnApplicationShutdown {
  constructor(@Inject(CacheStore) private readonly store: CacheStore) {}

  async onApplicationShutdown(): Promise<void> {
    await this.store.close();
  }
}
