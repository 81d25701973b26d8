import { PipelineConfig } from '../src/config/pipeline-config';
import { CurrentQuote, ExtractedData, HistoricalSeries } from '../src/types/crypto';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const BASE_TIME = Date.UTC(2024, 0, 1);

export function makeSeries(coinId: string, prices: number[], volumes?: number[]): HistoricalSeries {
  const volumeValues = volumes ?? prices.map(() => 1000);
  return {
    coinId,
    currency: 'usd',
    prices: prices.map((price, i) => ({ timestamp: new Date(BASE_TIME + i * DAY_MS), price })),
    volumes: volumeValues.map((volume, i) => ({ timestamp: new Date(BASE_TIME + i * DAY_MS), volume })),
  };
}

export function makeQuote(coinId: string, overrides: Partial<CurrentQuote> = {}): CurrentQuote {
  return {
    coin_id: coinId,
    name: coinId.toUpperCase(),
    symbol: coinId.slice(0, 3),
    current_price: 100,
    market_cap: 1000,
    market_cap_rank: 1,
    total_volume: 50,
    circulating_supply: 10,
    price_change_24h: 1,
    price_change_percentage_24h: 1,
    price_change_percentage_7d: 2,
    price_change_percentage_30d: 3,
    ath: 120,
    ath_change_percentage: -16.7,
    ath_date: '2023-12-01T00:00:00.000Z',
    atl: 1,
    atl_change_percentage: 9900,
    atl_date: '2015-01-01T00:00:00.000Z',
    extracted_at: new Date(BASE_TIME).toISOString(),
    ...overrides,
  };
}

/** Thirty daily prices alternating +2% / -1%. */
export function zigzagPrices(start: number, count: number = 30): number[] {
  const prices = [start];
  for (let i = 1; i < count; i++) {
    prices.push(prices[i - 1] * (i % 2 === 1 ? 1.02 : 0.99));
  }
  return prices;
}

export function makeExtractedData(overrides: Partial<ExtractedData> = {}): ExtractedData {
  return {
    currentQuotes: [
      makeQuote('bitcoin', { market_cap: 600, market_cap_rank: 1 }),
      makeQuote('ethereum', { market_cap: 300, market_cap_rank: 2 }),
    ],
    globalSnapshot: { totalMarketCapUsd: 1200, totalVolumeUsd: 100, extractedAt: new Date(BASE_TIME).toISOString() },
    historicalSeries: [makeSeries('bitcoin', zigzagPrices(100)), makeSeries('ethereum', zigzagPrices(10))],
    extractionTimestamp: new Date(BASE_TIME).toISOString(),
    signature: 'test-signature',
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    coins: ['bitcoin', 'ethereum'],
    vsCurrency: 'usd',
    historyDays: 30,
    databasePath: ':memory:',
    api: {
      baseUrl: 'http://coingecko.test/api/v3',
      timeoutMs: 1000,
      retryAttempts: 3,
      retryDelayMs: 5,
      requestDelayMs: 10,
      rateLimit: { maxRequestsPerMinute: 30, buffer: 5 },
    },
    metrics: { volatilityWindow: 7, riskFreeRate: 0.02 },
    quality: { maxNullPercentage: 0.05, minPriceValue: 0, maxPriceChangePercentage: 50, freshnessThresholdHours: 24 },
    ...overrides,
  };
}
