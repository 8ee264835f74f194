import BinanceApi, { Binance, DailyStatsResult } from 'binance-api-node';
import { Injectable } from '@nestjs/common';
import { LogService } from '../log/log.service';
import { FetchError, errorCode, errorMessage } from '../../libs/errors/report.error';
import { MARKET_SECTION, MarketSummary } from '../../models/market-summary';
import { MarketConfig } from '../../models/report-config';
import { TimeoutError, withTimeout } from '../../utils';

const INVALID_SYMBOL_CODE = -1121;

@Injectable()
export class MarketService {
  public binance: Binance | null = null;

  constructor(
    private readonly logService: LogService
  ) { }

  getClient(): Binance {
    if (!this.binance) this.binance = BinanceApi();
    return this.binance;
  }

  /**
   * One summary per listed symbol, in configured order.
   * Symbols the exchange does not list are skipped with a warning.
   */
  async getMarketSummaries(config: MarketConfig): Promise<MarketSummary[]> {
    const { symbols, quoteAsset, timeoutMs } = config;
    const summaries: MarketSummary[] = [];

    for (const symbol of symbols) {
      const pair = `${symbol}${quoteAsset}`;
      let stats: DailyStatsResult | DailyStatsResult[];
      try {
        stats = await withTimeout(this.getClient().dailyStats({ symbol: pair }), timeoutMs);
      } catch (e) {
        if (this.isInvalidSymbol(e)) {
          this.logService.warn(`No market data for ${pair}: ${errorMessage(e)}`);
          continue;
        }
        const reason = e instanceof TimeoutError ? `${pair} timed out after ${timeoutMs}ms` : `${pair}: ${errorMessage(e)}`;
        throw new FetchError(MARKET_SECTION, reason, { cause: e });
      }

      const ticker = Array.isArray(stats) ? stats.find(item => item.symbol === pair) : stats;
      if (!ticker) {
        this.logService.warn(`No market data for ${pair}`);
        continue;
      }
      summaries.push(this.toSummary(symbol, pair, ticker));
    }

    if (!summaries.length) {
      throw new FetchError(MARKET_SECTION, `no data for any of ${symbols.join(', ')}`);
    }
    this.logService.log(`Fetched market data for ${summaries.map(({ symbol }) => symbol).join(', ')}`);
    return summaries;
  }

  toSummary(symbol: string, pair: string, ticker: DailyStatsResult): MarketSummary {
    const summary: MarketSummary = {
      symbol,
      pair,
      price: parseFloat(ticker.lastPrice),
      changePercent24h: parseFloat(ticker.priceChangePercent),
      volume24h: parseFloat(ticker.volume),
      quoteVolume24h: parseFloat(ticker.quoteVolume),
      high24h: parseFloat(ticker.highPrice),
      low24h: parseFloat(ticker.lowPrice),
    };
    if (!Number.isFinite(summary.price) || !Number.isFinite(summary.changePercent24h)) {
      throw new FetchError(MARKET_SECTION, `malformed ticker for ${pair}`);
    }
    return summary;
  }

  isInvalidSymbol(error: unknown) {
    return errorCode(error) === INVALID_SYMBOL_CODE || /invalid symbol/i.test(errorMessage(error));
  }
}
