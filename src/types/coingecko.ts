// Response shapes of the CoinGecko v3 endpoints used by the extractor.
// Fields are optional because the feed omits or nulls them for thin markets.

export interface CoinGeckoMarketCoin {
  id: string;
  symbol: string;
  name: string;
  current_price?: number | null;
  market_cap?: number | null;
  market_cap_rank?: number | null;
  total_volume?: number | null;
  circulating_supply?: number | null;
  price_change_24h?: number | null;
  price_change_percentage_24h?: number | null;
  price_change_percentage_24h_in_currency?: number | null;
  price_change_percentage_7d_in_currency?: number | null;
  price_change_percentage_30d_in_currency?: number | null;
  ath?: number | null;
  ath_change_percentage?: number | null;
  ath_date?: string | null;
  atl?: number | null;
  atl_change_percentage?: number | null;
  atl_date?: string | null;
  last_updated?: string | null;
}

export interface CoinGeckoGlobalResponse {
  data?: {
    total_market_cap?: Record<string, number>;
    total_volume?: Record<string, number>;
    market_cap_percentage?: Record<string, number>;
  };
}

/** `[epochMillis, value]` pairs. */
export type CoinGeckoChartPoint = [number, number];

export interface CoinGeckoMarketChart {
  prices?: CoinGeckoChartPoint[];
  market_caps?: CoinGeckoChartPoint[];
  total_volumes?: CoinGeckoChartPoint[];
}
