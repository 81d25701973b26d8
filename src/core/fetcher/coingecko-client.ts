import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { ApiConfig } from '../../config/pipeline-config';
import { CoinGeckoGlobalResponse, CoinGeckoMarketChart, CoinGeckoMarketCoin } from '../../types/coingecko';
import { createLogger } from '../../utils/logger';
import { ExtractionError } from '../errors';

const logger = createLogger('CoinGeckoClient');

const RATE_LIMIT_BACKOFF_MS = 60 * 1000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface CoinGeckoClientOptions {
  /** Replaces the HTTP transport, used by tests. */
  adapter?: AxiosAdapter;
  sleep?: Sleep;
}

export class CoinGeckoClient {
  private readonly api: AxiosInstance;
  private readonly sleep: Sleep;
  private lastRequestTime: number = 0;
  private requestCount: number = 0;

  constructor(private readonly config: ApiConfig, options: CoinGeckoClientOptions = {}) {
    this.api = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      adapter: options.adapter,
    });
    this.sleep = options.sleep ?? sleep;
  }

  private async enforceRateLimit(): Promise<void> {
    const now = Date.now();
    const oneMinute = 60 * 1000;
    const { maxRequestsPerMinute, buffer } = this.config.rateLimit;

    if (now - this.lastRequestTime >= oneMinute) {
      this.requestCount = 0;
      this.lastRequestTime = now;
    }

    if (this.requestCount >= maxRequestsPerMinute - buffer) {
      const waitTime = oneMinute - (now - this.lastRequestTime);
      logger.info(`Rate limit approaching, waiting ${waitTime}ms`);
      await this.sleep(waitTime);
      this.requestCount = 0;
      this.lastRequestTime = Date.now();
    }

    this.requestCount++;
  }

  /**
   * GET with a fixed number of attempts. A 429 waits out the rate-limit window
   * before the next attempt; other failures wait `retryDelayMs`.
   */
  private async get<T>(endpoint: string, params?: Record<string, string | number | boolean>): Promise<T> {
    const attempts = this.config.retryAttempts;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.enforceRateLimit();
        logger.debug(`Making request to ${endpoint}`, { attempt, params });
        const response = await this.api.get<T>(endpoint, { params });
        return response.data;
      } catch (error) {
        lastError = error;
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        logger.warn(`Request failed (attempt ${attempt}/${attempts})`, {
          endpoint,
          status,
          error: error instanceof Error ? error.message : String(error),
        });

        if (attempt < attempts) {
          await this.sleep(status === 429 ? RATE_LIMIT_BACKOFF_MS : this.config.retryDelayMs);
        }
      }
    }

    logger.error(`All retry attempts failed for ${endpoint}`);
    throw new ExtractionError(`Failed to fetch ${endpoint} from CoinGecko`, { cause: lastError });
  }

  async getMarkets(coinIds: string[], vsCurrency: string): Promise<CoinGeckoMarketCoin[]> {
    const data = await this.get<CoinGeckoMarketCoin[]>('/coins/markets', {
      ids: coinIds.join(','),
      vs_currency: vsCurrency,
      order: 'market_cap_desc',
      per_page: 250,
      page: 1,
      sparkline: false,
      price_change_percentage: '24h,7d,30d',
    });
    return Array.isArray(data) ? data : [];
  }

  async getGlobal(): Promise<CoinGeckoGlobalResponse> {
    return this.get<CoinGeckoGlobalResponse>('/global');
  }

  async getMarketChart(coinId: string, vsCurrency: string, days: number): Promise<CoinGeckoMarketChart> {
    return this.get<CoinGeckoMarketChart>(`/coins/${encodeURIComponent(coinId)}/market_chart`, {
      vs_currency: vsCurrency,
      days,
      interval: 'daily',
    });
  }
}
