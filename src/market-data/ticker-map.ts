// Internal ticker -> quote provider coin id.
export const PROVIDER_IDS: Readonly<Record<string, string>> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  USDT: 'tether',
  USDC: 'usd-coin',
  DOGE: 'dogecoin',
  XRP: 'ripple',
  ADA: 'cardano',
  DOT: 'polkadot',
  AVAX: 'avalanche-2',
  MATIC: 'matic-network',
  LINK: 'chainlink',
  LTC: 'litecoin',
  BCH: 'bitcoin-cash',
  ATOM: 'cosmos',
  UNI: 'uniswap',
  XLM: 'stellar',
  ETC: 'ethereum-classic',
};

export function toProviderId(ticker: string): string | undefined {
  const symbol = ticker.toUpperCase();
  return Object.hasOwn(PROVIDER_IDS, symbol) ? PROVIDER_IDS[symbol] : undefined;
}
