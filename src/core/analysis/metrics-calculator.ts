import { METRICS_CONFIG } from '../../config/constants';
import { MetricsConfig } from '../../config/pipeline-config';
import {
  CorrelationMatrix,
  CorrelationRow,
  CurrentQuote,
  DominanceMetrics,
  FearGreedMetrics,
  GlobalMarketSnapshot,
  HistoricalSeries,
  MetricRecordSet,
  Sentiment,
  SharpeMetrics,
  VolatilityMetrics,
} from '../../types/crypto';
import { createLogger } from '../../utils/logger';
import {
  clamp,
  head,
  isReturnSeries,
  mean,
  pearson,
  percentChange,
  sampleStdDev,
  simpleReturns,
  sortByTimestamp,
  tail,
} from './series';

const logger = createLogger('MetricsCalculator');

const ANNUALIZATION_FACTOR = Math.sqrt(METRICS_CONFIG.annualizationDays);

const SENTIMENT_THRESHOLDS: ReadonlyArray<[number, Sentiment]> = [
  [20, 'Extreme Fear'],
  [40, 'Fear'],
  [60, 'Neutral'],
  [80, 'Greed'],
];

/**
 * Maps a composite score to its label. Intervals are half-open:
 * [0,20) Extreme Fear, [20,40) Fear, [40,60) Neutral, [60,80) Greed, [80,100] Extreme Greed.
 */
export function classifySentiment(score: number): Sentiment {
  for (const [upperBound, label] of SENTIMENT_THRESHOLDS) {
    if (score < upperBound) return label;
  }
  return 'Extreme Greed';
}

/**
 * Flattens a correlation matrix into one row per ordered coin pair, skipping
 * the diagonal. Both (a, b) and (b, a) are emitted.
 */
export function toCorrelationRows(matrix: CorrelationMatrix, extractedDate: string): CorrelationRow[] {
  const rows: CorrelationRow[] = [];
  matrix.coinIds.forEach((coinId1, i) => {
    matrix.coinIds.forEach((coinId2, j) => {
      if (i === j) return;
      rows.push({
        extracted_date: extractedDate,
        coin_id_1: coinId1,
        coin_id_2: coinId2,
        correlation_coefficient: matrix.values[i][j],
      });
    });
  });
  return rows;
}

function sortedPrices(series: HistoricalSeries): number[] {
  return sortByTimestamp(series.prices).map(point => point.price);
}

function sortedVolumes(series: HistoricalSeries): number[] {
  return sortByTimestamp(series.volumes).map(point => point.volume);
}

/**
 * Derived market metrics over quotes and daily history. Every method is pure:
 * inputs are not modified and each call builds a new result. Coins without
 * enough history are left out of a metric's output.
 */
export class MetricsCalculator {
  constructor(private readonly config: MetricsConfig) {}

  /**
   * Market dominance = coin market cap / total market cap * 100, with a dense
   * rank (1 = largest).
   * @returns null when there are no quotes or the total market cap is not positive
   */
  calculateMarketDominance(
    quotes: readonly CurrentQuote[],
    globalSnapshot: GlobalMarketSnapshot
  ): MetricRecordSet<DominanceMetrics> | null {
    if (quotes.length === 0) {
      logger.warn('Empty data provided for market dominance calculation');
      return null;
    }

    const totalMarketCap = globalSnapshot.totalMarketCapUsd;
    if (!(totalMarketCap > 0)) {
      logger.warn('Total market cap is not positive, cannot calculate dominance', { totalMarketCap });
      return null;
    }

    const dominance = new Map<string, number>();
    for (const quote of quotes) {
      if (quote.market_cap === null || !Number.isFinite(quote.market_cap) || dominance.has(quote.coin_id)) {
        continue;
      }
      dominance.set(quote.coin_id, (quote.market_cap / totalMarketCap) * 100);
    }

    const distinctDesc = [...new Set(dominance.values())].sort((a, b) => b - a);
    const rankOf = new Map(distinctDesc.map((value, index) => [value, index + 1]));

    const results = new Map<string, DominanceMetrics>();
    for (const [coinId, pct] of dominance) {
      results.set(coinId, {
        market_dominance_pct: pct,
        dominance_rank: rankOf.get(pct) ?? distinctDesc.length,
      });
    }

    logger.info(`Calculated market dominance for ${results.size} cryptocurrencies`);
    return results;
  }

  /**
   * Annualized volatility (sample stdev of simple daily returns * sqrt(365))
   * over the whole supplied history and over the most recent `volatilityWindow`
   * returns. The "30d" fields describe whatever span the caller fetched;
   * `observation_count` records its length.
   */
  calculateVolatility(historicalSeries: readonly HistoricalSeries[]): MetricRecordSet<VolatilityMetrics> {
    const window = this.config.volatilityWindow;
    const results = new Map<string, VolatilityMetrics>();

    for (const series of historicalSeries) {
      const prices = sortedPrices(series);
      if (prices.length < 2 || !isReturnSeries(prices) || results.has(series.coinId)) {
        continue;
      }

      const returns = simpleReturns(prices);
      results.set(series.coinId, {
        volatility_30d: sampleStdDev(returns) * ANNUALIZATION_FACTOR,
        volatility_7d: sampleStdDev(tail(returns, window)) * ANNUALIZATION_FACTOR,
        volatility_window: window,
        price_change_30d_pct: percentChange(prices[0], prices[prices.length - 1]) ?? 0,
        avg_price_30d: mean(prices),
        max_price_30d: Math.max(...prices),
        min_price_30d: Math.min(...prices),
        observation_count: prices.length,
      });
    }

    logger.info(`Calculated volatility for ${results.size} cryptocurrencies`);
    return results;
  }

  /**
   * Pearson correlation of simple daily returns. Each coin's returns are
   * computed on its own series, then aligned by timestamp; only timestamps
   * present for every coin are used (complete-case). A repeated timestamp
   * within one coin keeps the later return.
   */
  calculateCorrelationMatrix(historicalSeries: readonly HistoricalSeries[]): CorrelationMatrix {
    const returnsByCoin = new Map<string, Map<number, number>>();

    for (const series of historicalSeries) {
      if (series.prices.length === 0 || returnsByCoin.has(series.coinId)) {
        continue;
      }
      const points = sortByTimestamp(series.prices);
      const prices = points.map(point => point.price);
      if (!isReturnSeries(prices)) {
        logger.warn(`Skipping ${series.coinId} in correlation: series contains unusable prices`);
        continue;
      }

      const byTimestamp = new Map<number, number>();
      simpleReturns(prices).forEach((value, index) => {
        byTimestamp.set(points[index + 1].timestamp.getTime(), value);
      });
      returnsByCoin.set(series.coinId, byTimestamp);
    }

    if (returnsByCoin.size === 0) {
      logger.warn('No price data available for correlation calculation');
      return { coinIds: [], values: [] };
    }

    const coinIds = [...returnsByCoin.keys()];
    const columns = [...returnsByCoin.values()];
    const completeTimestamps = [...columns[0].keys()]
      .filter(ts => columns.every(column => column.has(ts)))
      .sort((a, b) => a - b);
    const vectors = columns.map(column => completeTimestamps.map(ts => column.get(ts) ?? 0));

    const values: (number | null)[][] = coinIds.map(() => coinIds.map(() => null));
    for (let i = 0; i < coinIds.length; i++) {
      values[i][i] = 1.0;
      for (let j = i + 1; j < coinIds.length; j++) {
        const coefficient = pearson(vectors[i], vectors[j]);
        values[i][j] = coefficient;
        values[j][i] = coefficient;
      }
    }

    logger.info(`Calculated correlation matrix for ${coinIds.length} cryptocurrencies`, {
      alignedObservations: completeTimestamps.length,
    });
    return { coinIds, values };
  }

  /**
   * Sharpe ratio = (annualized return - risk free rate) / annualized volatility.
   * Annualization uses the number of observed points as the day count, which
   * only matches calendar time for gap-free daily data. Zero volatility yields
   * a ratio of 0.
   */
  calculateSharpeRatio(historicalSeries: readonly HistoricalSeries[]): MetricRecordSet<SharpeMetrics> {
    const riskFreeRate = this.config.riskFreeRate;
    const results = new Map<string, SharpeMetrics>();

    for (const series of historicalSeries) {
      const prices = sortedPrices(series);
      if (prices.length < 2 || !isReturnSeries(prices) || results.has(series.coinId)) {
        continue;
      }

      const totalReturn = prices[prices.length - 1] / prices[0] - 1;
      const annualizedReturn = Math.pow(1 + totalReturn, METRICS_CONFIG.annualizationDays / prices.length) - 1;
      const annualizedVolatility = sampleStdDev(simpleReturns(prices)) * ANNUALIZATION_FACTOR;

      results.set(series.coinId, {
        annualized_return: annualizedReturn,
        annualized_volatility: annualizedVolatility,
        sharpe_ratio: annualizedVolatility > 0 ? (annualizedReturn - riskFreeRate) / annualizedVolatility : 0,
      });
    }

    logger.info(`Calculated Sharpe ratio for ${results.size} cryptocurrencies`);
    return results;
  }

  /**
   * Composite 0-100 sentiment score:
   * - momentum (30%): total price change % + 50, clamped to [0, 100]
   * - volatility (30%): 100 - 1000 * stdev(returns), floored at 0
   * - volume (40%): change of the latest 7 volumes' mean over the earliest 7, + 50, clamped;
   *   50 when there are not more than 7 volumes or the earliest mean is 0
   */
  calculateFearGreedScore(historicalSeries: readonly HistoricalSeries[]): MetricRecordSet<FearGreedMetrics> {
    const volumeWindow = METRICS_CONFIG.fearGreedVolumeWindow;
    const results = new Map<string, FearGreedMetrics>();

    for (const series of historicalSeries) {
      const prices = sortedPrices(series);
      if (prices.length < METRICS_CONFIG.fearGreedMinPoints || !isReturnSeries(prices) || results.has(series.coinId)) {
        continue;
      }

      const priceChange = percentChange(prices[0], prices[prices.length - 1]) ?? 0;
      const momentumComponent = clamp(priceChange + 50, 0, 100);
      const volatilityComponent = Math.max(0, 100 - sampleStdDev(simpleReturns(prices)) * 1000);

      let volumeComponent = 50;
      const volumes = sortedVolumes(series);
      if (volumes.length > volumeWindow) {
        const recent = mean(tail(volumes, volumeWindow));
        const older = mean(head(volumes, volumeWindow));
        if (older > 0) {
          volumeComponent = clamp(((recent - older) / older) * 100 + 50, 0, 100);
        }
      }

      const score = momentumComponent * 0.3 + volatilityComponent * 0.3 + volumeComponent * 0.4;
      results.set(series.coinId, {
        fear_greed_score: score,
        sentiment: classifySentiment(score),
        momentum_component: momentumComponent,
        volatility_component: volatilityComponent,
        volume_component: volumeComponent,
      });
    }

    logger.info(`Calculated Fear & Greed scores for ${results.size} cryptocurrencies`);
    return results;
  }
}
