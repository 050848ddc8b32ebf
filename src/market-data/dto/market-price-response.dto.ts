// Current price for one ticker
export interface MarketPriceResponseDto {
  ticker: string;
  price: number;
  refreshed: boolean;       // true when the provider was queried regardless of cache
  retrievedAt: string;      // ISO timestamp
}
