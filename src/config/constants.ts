// Coins tracked when COINS_TO_TRACK is not set
export const DEFAULT_COINS = [
  'bitcoin',
  'ethereum',
  'tether',
  'binancecoin',
  'solana',
  'ripple',
  'cardano',
  'dogecoin',
  'polkadot',
  'chainlink',
];

export const DEFAULT_VS_CURRENCY = 'usd';
export const DEFAULT_HISTORY_DAYS = 30;
export const DEFAULT_DATABASE_PATH = './data/crypto_metrics.db';

export const API_CONFIG = {
  baseUrl: 'https://api.coingecko.com/api/v3',
  timeoutMs: 30000,
  retryAttempts: 3,
  retryDelayMs: 5000,
  // Pause between per-coin history requests
  requestDelayMs: 1000,
  maxRequestsPerMinute: 30,
  rateLimitBuffer: 5,
} as const;

export const METRICS_CONFIG = {
  volatilityWindow: 7,
  riskFreeRate: 0.02,
  // Calendar-day scaling for daily returns
  annualizationDays: 365,
  fearGreedMinPoints: 7,
  fearGreedVolumeWindow: 7,
} as const;

export const QUALITY_CONFIG = {
  maxNullPercentage: 0.05,
  minPriceValue: 0,
  maxPriceChangePercentage: 50,
  freshnessThresholdHours: 24,
  maxReportedAnomalies: 10,
} as const;

export const FACT_TABLE_NAME = 'fact_crypto_metrics';

export const PRICE_CHANGE_COLUMNS = [
  'price_change_percentage_24h',
  'price_change_percentage_7d',
  'price_change_percentage_30d',
] as const;
