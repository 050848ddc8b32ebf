import { Global, Module } from '@nestjs/common';
import dotenv from 'dotenv';
import { APP_CONFIG, AppConfig, PRICE_CACHE_TTL, loadConfig } from './app-config';

@Global()
@Module({
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: (): AppConfig => {
        dotenv.config();
        return loadConfig();
      },
    },
    {
      provide: PRICE_CACHE_TTL,
      useFactory: (config: AppConfig): number => config.priceCacheTtlSeconds,
      inject: [APP_CONFIG],
    },
  ],
  exports: [APP_CONFIG, PRICE_CACHE_TTL],
})
export class ConfigModule {}
