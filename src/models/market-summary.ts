export const MARKET_SECTION = 'market summary';

export interface MarketSummary {
  /**
   * Base asset, ex: BTC
   */
  symbol: string;

  /**
   * Exchange pair, ex: BTCUSDT
   */
  pair: string;

  price: number;

  changePercent24h: number;

  volume24h: number;

  quoteVolume24h: number;

  high24h: number;

  low24h: number;
}
