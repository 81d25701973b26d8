import { ConfigError } from '../core/errors';
import { RateLimitConfig } from '../types/crypto';
import {
  API_CONFIG,
  DEFAULT_COINS,
  DEFAULT_DATABASE_PATH,
  DEFAULT_HISTORY_DAYS,
  DEFAULT_VS_CURRENCY,
  METRICS_CONFIG,
  QUALITY_CONFIG,
} from './constants';

export interface ApiConfig {
  baseUrl: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  requestDelayMs: number;
  rateLimit: RateLimitConfig;
}

export interface MetricsConfig {
  volatilityWindow: number;
  riskFreeRate: number;
}

export interface QualityConfig {
  maxNullPercentage: number;
  minPriceValue: number;
  maxPriceChangePercentage: number;
  freshnessThresholdHours: number;
}

export interface PipelineConfig {
  coins: string[];
  vsCurrency: string;
  historyDays: number;
  databasePath: string;
  api: ApiConfig;
  metrics: MetricsConfig;
  quality: QualityConfig;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, check: (value: number) => boolean = () => true): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`Invalid value for ${key}: "${raw}"`);
  }
  return value;
}

const positiveInt = (value: number) => Number.isInteger(value) && value > 0;
const nonNegative = (value: number) => value >= 0;

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) {
    return [...fallback];
  }
  const items = raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
  if (items.length === 0) {
    throw new ConfigError(`${key} must list at least one value`);
  }
  return items;
}

/**
 * Builds the run configuration from environment variables. Called once at
 * process start; the result is passed to every component that needs it.
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const maxNullPercentage = readNumber(env, 'MAX_NULL_PERCENTAGE', QUALITY_CONFIG.maxNullPercentage, v => v >= 0 && v <= 1);

  const config: PipelineConfig = {
    coins: readList(env, 'COINS_TO_TRACK', DEFAULT_COINS),
    vsCurrency: env.VS_CURRENCY || DEFAULT_VS_CURRENCY,
    historyDays: readNumber(env, 'HISTORY_DAYS', DEFAULT_HISTORY_DAYS, positiveInt),
    databasePath: env.DATABASE_PATH || DEFAULT_DATABASE_PATH,
    api: {
      baseUrl: env.COINGECKO_API_URL || API_CONFIG.baseUrl,
      timeoutMs: readNumber(env, 'API_TIMEOUT_MS', API_CONFIG.timeoutMs, positiveInt),
      retryAttempts: readNumber(env, 'API_RETRY_ATTEMPTS', API_CONFIG.retryAttempts, positiveInt),
      retryDelayMs: readNumber(env, 'API_RETRY_DELAY_MS', API_CONFIG.retryDelayMs, nonNegative),
      requestDelayMs: readNumber(env, 'API_REQUEST_DELAY_MS', API_CONFIG.requestDelayMs, nonNegative),
      rateLimit: {
        maxRequestsPerMinute: readNumber(env, 'MAX_REQUESTS_PER_MINUTE', API_CONFIG.maxRequestsPerMinute, positiveInt),
        buffer: readNumber(env, 'RATE_LIMIT_BUFFER', API_CONFIG.rateLimitBuffer, nonNegative),
      },
    },
    metrics: {
      volatilityWindow: readNumber(env, 'VOLATILITY_WINDOW', METRICS_CONFIG.volatilityWindow, positiveInt),
      riskFreeRate: readNumber(env, 'SHARPE_RATIO_RISK_FREE_RATE', METRICS_CONFIG.riskFreeRate),
    },
    quality: {
      maxNullPercentage,
      minPriceValue: readNumber(env, 'MIN_PRICE_VALUE', QUALITY_CONFIG.minPriceValue),
      maxPriceChangePercentage: readNumber(env, 'MAX_PRICE_CHANGE_PERCENTAGE', QUALITY_CONFIG.maxPriceChangePercentage, nonNegative),
      freshnessThresholdHours: readNumber(env, 'FRESHNESS_THRESHOLD_HOURS', QUALITY_CONFIG.freshnessThresholdHours, v => v > 0),
    },
  };

  if (config.api.rateLimit.buffer >= config.api.rateLimit.maxRequestsPerMinute) {
    throw new ConfigError('RATE_LIMIT_BUFFER must be lower than MAX_REQUESTS_PER_MINUTE');
  }

  return Object.freeze(config);
}
