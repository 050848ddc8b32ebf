import Decimal from 'decimal.js';

/**
 * External quote provider adapter.
 * Resolves undefined for unknown tickers and for provider failures;
 * rejects only on faults the caller cannot treat as "not found".
 */
export abstract class MarketDataSource {
  abstract fetchPrice(ticker: string): Promise<Decimal | undefined>;
}
