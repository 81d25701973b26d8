export interface PricePoint {
  timestamp: Date;
  price: number;
}

export interface VolumePoint {
  timestamp: Date;
  volume: number;
}

/** One coin's daily history, as returned by the market_chart endpoint. */
export interface HistoricalSeries {
  coinId: string;
  currency: string;
  prices: readonly PricePoint[];
  volumes: readonly VolumePoint[];
}

/**
 * Current market quote for a coin. Optional numeric fields are `null` when the
 * source feed leaves them empty.
 */
export type CurrentQuote = {
  coin_id: string;
  name: string;
  symbol: string;
  current_price: number | null;
  market_cap: number | null;
  market_cap_rank: number | null;
  total_volume: number | null;
  circulating_supply: number | null;
  price_change_24h: number | null;
  price_change_percentage_24h: number | null;
  price_change_percentage_7d: number | null;
  price_change_percentage_30d: number | null;
  ath: number | null;
  ath_change_percentage: number | null;
  ath_date: string | null;
  atl: number | null;
  atl_change_percentage: number | null;
  atl_date: string | null;
  extracted_at: string;
};

export interface GlobalMarketSnapshot {
  totalMarketCapUsd: number;
  totalVolumeUsd: number;
  extractedAt: string;
}

export interface ExtractedData {
  currentQuotes: CurrentQuote[];
  globalSnapshot: GlobalMarketSnapshot;
  historicalSeries: HistoricalSeries[];
  extractionTimestamp: string;
  signature: string;
}

export type MetricRecordSet<T> = ReadonlyMap<string, T>;

export type DominanceMetrics = {
  market_dominance_pct: number;
  dominance_rank: number;
};

export type VolatilityMetrics = {
  volatility_7d: number;
  volatility_30d: number;
  volatility_window: number;
  price_change_30d_pct: number;
  avg_price_30d: number;
  max_price_30d: number;
  min_price_30d: number;
  observation_count: number;
};

export type SharpeMetrics = {
  sharpe_ratio: number;
  annualized_return: number;
  annualized_volatility: number;
};

export type Sentiment = 'Extreme Fear' | 'Fear' | 'Neutral' | 'Greed' | 'Extreme Greed';

export type FearGreedMetrics = {
  fear_greed_score: number;
  sentiment: Sentiment;
  momentum_component: number;
  volatility_component: number;
  volume_component: number;
};

type Nullable<T> = { [K in keyof T]: T[K] | null };

/** One row of the wide, coin-keyed fact table written per extraction date. */
export type FactRow = CurrentQuote &
  Nullable<DominanceMetrics> &
  Nullable<VolatilityMetrics> &
  Nullable<SharpeMetrics> &
  Nullable<FearGreedMetrics> & {
    extracted_date: string;
    extracted_timestamp: string;
  };

/**
 * Square correlation matrix. `values[i][j]` is the coefficient between
 * `coinIds[i]` and `coinIds[j]`; `null` where it is undefined.
 */
export interface CorrelationMatrix {
  coinIds: string[];
  values: (number | null)[][];
}

export interface CorrelationRow {
  extracted_date: string;
  coin_id_1: string;
  coin_id_2: string;
  correlation_coefficient: number | null;
}

export interface TransformedData {
  marketDominance: MetricRecordSet<DominanceMetrics> | null;
  volatility: MetricRecordSet<VolatilityMetrics>;
  correlationMatrix: CorrelationMatrix;
  sharpeRatio: MetricRecordSet<SharpeMetrics>;
  fearGreed: MetricRecordSet<FearGreedMetrics>;
  factTable: FactRow[];
}

export interface RateLimitConfig {
  maxRequestsPerMinute: number;
  buffer: number;
}
