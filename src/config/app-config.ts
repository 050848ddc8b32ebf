import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

// setInterval takes at most 2^31-1 ms; longer delays collapse to 1 ms.
const MAX_INTERVAL_SECONDS = 2_147_483;

const intervalSeconds = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_INTERVAL_SECONDS).default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  PRICE_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  MARKET_DATA_BASE_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  MARKET_DATA_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  QUOTE_CURRENCY: z.string().min(1).default('usd'),
  PRICE_REFRESH_INTERVAL_SECONDS: intervalSeconds(300),
  SNAPSHOT_INTERVAL_SECONDS: intervalSeconds(86_400),
  JOBS_ENABLED: booleanFlag,
});

export interface AppConfig {
  port: number;
  priceCacheTtlSeconds: number;
  marketDataBaseUrl: string;
  marketDataTimeoutMs: number;
  quoteCurrency: string;
  priceRefreshIntervalSeconds: number;
  snapshotIntervalSeconds: number;
  jobsEnabled: boolean;
}

export const APP_CONFIG = Symbol('APP_CONFIG');
export const PRICE_CACHE_TTL = Symbol('PRICE_CACHE_TTL');

/**
 * Validates environment variables into the typed application config.
 * @throws Error listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  const env = result.data;
  return {
    port: env.PORT,
    priceCacheTtlSeconds: env.PRICE_CACHE_TTL_SECONDS,
    marketDataBaseUrl: env.MARKET_DATA_BASE_URL.replace(/\/+$/, ''),
    marketDataTimeoutMs: env.MARKET_DATA_TIMEOUT_MS,
    quoteCurrency: env.QUOTE_CURRENCY.toLowerCase(),
    priceRefreshIntervalSeconds: env.PRICE_REFRESH_INTERVAL_SECONDS,
    snapshotIntervalSeconds: env.SNAPSHOT_INTERVAL_SECONDS,
    jobsEnabled: env.JOBS_ENABLED,
  };
}
