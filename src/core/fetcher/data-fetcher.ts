import crypto from 'crypto-js';
import { PipelineConfig } from '../../config/pipeline-config';
import {
  CoinGeckoChartPoint,
  CoinGeckoGlobalResponse,
  CoinGeckoMarketChart,
  CoinGeckoMarketCoin,
} from '../../types/coingecko';
import { CurrentQuote, ExtractedData, GlobalMarketSnapshot, HistoricalSeries } from '../../types/crypto';
import { createLogger } from '../../utils/logger';
import { ExtractionError, errorMessage } from '../errors';
import { CoinGeckoClient, Sleep, sleep } from './coingecko-client';

const logger = createLogger('DataFetcher');

export type MarketDataClient = Pick<CoinGeckoClient, 'getMarkets' | 'getGlobal' | 'getMarketChart'>;

/** Source of one run's raw inputs. */
export interface Extractor {
  extractAllData(): Promise<ExtractedData>;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function isChartPoint(point: unknown): point is CoinGeckoChartPoint {
  return (
    Array.isArray(point) &&
    point.length >= 2 &&
    typeof point[0] === 'number' &&
    typeof point[1] === 'number' &&
    Number.isFinite(point[0]) &&
    Number.isFinite(point[1])
  );
}

function validPoints(points: unknown, coinId: string, field: string): CoinGeckoChartPoint[] {
  if (!Array.isArray(points)) return [];
  const valid = points.filter(isChartPoint);
  if (valid.length < points.length) {
    logger.warn(`Dropped ${points.length - valid.length} malformed ${field} points for ${coinId}`);
  }
  return valid;
}

/**
 * Converts a markets entry into a quote.
 * @returns null when the entry lacks an id, name or symbol
 */
export function toCurrentQuote(raw: CoinGeckoMarketCoin, extractedAt: string): CurrentQuote | null {
  const coinId = stringOrNull(raw.id);
  const name = stringOrNull(raw.name);
  const symbol = stringOrNull(raw.symbol);
  if (!coinId || !name || !symbol) {
    return null;
  }

  return {
    coin_id: coinId,
    name,
    symbol,
    current_price: numberOrNull(raw.current_price),
    market_cap: numberOrNull(raw.market_cap),
    market_cap_rank: numberOrNull(raw.market_cap_rank),
    total_volume: numberOrNull(raw.total_volume),
    circulating_supply: numberOrNull(raw.circulating_supply),
    price_change_24h: numberOrNull(raw.price_change_24h),
    price_change_percentage_24h:
      numberOrNull(raw.price_change_percentage_24h) ?? numberOrNull(raw.price_change_percentage_24h_in_currency),
    price_change_percentage_7d: numberOrNull(raw.price_change_percentage_7d_in_currency),
    price_change_percentage_30d: numberOrNull(raw.price_change_percentage_30d_in_currency),
    ath: numberOrNull(raw.ath),
    ath_change_percentage: numberOrNull(raw.ath_change_percentage),
    ath_date: stringOrNull(raw.ath_date),
    atl: numberOrNull(raw.atl),
    atl_change_percentage: numberOrNull(raw.atl_change_percentage),
    atl_date: stringOrNull(raw.atl_date),
    extracted_at: extractedAt,
  };
}

/** @throws ExtractionError when the payload carries no USD market cap */
export function toGlobalSnapshot(raw: CoinGeckoGlobalResponse, extractedAt: string): GlobalMarketSnapshot {
  const totalMarketCap = numberOrNull(raw.data?.total_market_cap?.usd);
  if (totalMarketCap === null) {
    throw new ExtractionError('Global market data has no USD total market cap');
  }
  return {
    totalMarketCapUsd: totalMarketCap,
    totalVolumeUsd: numberOrNull(raw.data?.total_volume?.usd) ?? 0,
    extractedAt,
  };
}

export function toHistoricalSeries(raw: CoinGeckoMarketChart, coinId: string, currency: string): HistoricalSeries {
  return {
    coinId,
    currency,
    prices: validPoints(raw.prices, coinId, 'price').map(([ts, price]) => ({ timestamp: new Date(ts), price })),
    volumes: validPoints(raw.total_volumes, coinId, 'volume').map(([ts, volume]) => ({ timestamp: new Date(ts), volume })),
  };
}

export class DataFetcher implements Extractor {
  constructor(
    private readonly client: MarketDataClient,
    private readonly config: PipelineConfig,
    private readonly wait: Sleep = sleep
  ) {}

  private generateSignature(quotes: CurrentQuote[]): string {
    return crypto.SHA256(JSON.stringify(quotes)).toString();
  }

  async fetchCurrentQuotes(): Promise<CurrentQuote[]> {
    const raw = await this.client.getMarkets(this.config.coins, this.config.vsCurrency);
    const extractedAt = new Date().toISOString();

    const quotes = raw
      .map(entry => toCurrentQuote(entry, extractedAt))
      .filter((quote): quote is CurrentQuote => quote !== null);

    if (quotes.length < raw.length) {
      logger.warn(`Dropped ${raw.length - quotes.length} market entries without id, name or symbol`);
    }
    logger.info(`Retrieved price data for ${quotes.length} cryptocurrencies`);
    return quotes;
  }

  async fetchGlobalSnapshot(): Promise<GlobalMarketSnapshot> {
    const snapshot = toGlobalSnapshot(await this.client.getGlobal(), new Date().toISOString());
    logger.info('Retrieved global market data', {
      totalMarketCapUsd: snapshot.totalMarketCapUsd,
      totalVolumeUsd: snapshot.totalVolumeUsd,
    });
    return snapshot;
  }

  /**
   * Fetches history one coin at a time with `requestDelayMs` between requests.
   * Coins whose history cannot be fetched are skipped.
   */
  async fetchHistoricalSeries(coinIds: string[]): Promise<HistoricalSeries[]> {
    const { vsCurrency, historyDays } = this.config;
    const results: HistoricalSeries[] = [];

    for (const [index, coinId] of coinIds.entries()) {
      if (index > 0) {
        await this.wait(this.config.api.requestDelayMs);
      }
      try {
        const chart = await this.client.getMarketChart(coinId, vsCurrency, historyDays);
        const series = toHistoricalSeries(chart, coinId, vsCurrency);
        results.push(series);
        logger.info(`Fetched historical data for ${coinId}`, { days: historyDays, dataPoints: series.prices.length });
      } catch (error) {
        logger.warn(`Skipping historical data for ${coinId}`, { error: errorMessage(error) });
      }
    }

    return results;
  }

  async extractAllData(): Promise<ExtractedData> {
    logger.info(`Starting full data extraction for ${this.config.coins.length} cryptocurrencies`);

    const currentQuotes = await this.fetchCurrentQuotes();
    if (currentQuotes.length === 0) {
      throw new ExtractionError('CoinGecko returned no market data for the configured coins');
    }

    const globalSnapshot = await this.fetchGlobalSnapshot();
    const historicalSeries = await this.fetchHistoricalSeries(this.config.coins);

    logger.info('Full data extraction completed', {
      coinsExtracted: currentQuotes.length,
      historicalDatasets: historicalSeries.length,
    });

    return {
      currentQuotes,
      globalSnapshot,
      historicalSeries,
      extractionTimestamp: new Date().toISOString(),
      signature: this.generateSignature(currentQuotes),
    };
  }
}
