import {
  CurrentQuote,
  DominanceMetrics,
  ExtractedData,
  FactRow,
  FearGreedMetrics,
  MetricRecordSet,
  SharpeMetrics,
  TransformedData,
  VolatilityMetrics,
} from '../../types/crypto';
import { createLogger } from '../../utils/logger';
import { TransformError } from '../errors';
import { MetricsCalculator } from './metrics-calculator';

const logger = createLogger('MetricsAggregator');

const EMPTY_METRICS = {
  market_dominance_pct: null,
  dominance_rank: null,
  volatility_7d: null,
  volatility_30d: null,
  volatility_window: null,
  price_change_30d_pct: null,
  avg_price_30d: null,
  max_price_30d: null,
  min_price_30d: null,
  observation_count: null,
  sharpe_ratio: null,
  annualized_return: null,
  annualized_volatility: null,
  fear_greed_score: null,
  sentiment: null,
  momentum_component: null,
  volatility_component: null,
  volume_component: null,
} satisfies Omit<FactRow, keyof CurrentQuote | 'extracted_date' | 'extracted_timestamp'>;

/** UTC calendar date (YYYY-MM-DD) used as the per-run idempotency key. */
export function toExtractedDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function joinMetric<T extends Partial<FactRow>>(rows: readonly FactRow[], records: MetricRecordSet<T> | null): FactRow[] {
  return rows.map(row => {
    const metrics = records?.get(row.coin_id);
    return metrics ? { ...row, ...metrics } : { ...row };
  });
}

export const joinDominance = (rows: readonly FactRow[], records: MetricRecordSet<DominanceMetrics> | null) =>
  joinMetric(rows, records);

export const joinVolatility = (rows: readonly FactRow[], records: MetricRecordSet<VolatilityMetrics>) =>
  joinMetric(rows, records);

export const joinSharpe = (rows: readonly FactRow[], records: MetricRecordSet<SharpeMetrics>) =>
  joinMetric(rows, records);

export const joinFearGreed = (rows: readonly FactRow[], records: MetricRecordSet<FearGreedMetrics>) =>
  joinMetric(rows, records);

/**
 * Base fact rows, one per distinct coin id, with every metric column empty.
 */
export function buildBaseRows(quotes: readonly CurrentQuote[], runDate: Date): FactRow[] {
  const seen = new Set<string>();
  const rows: FactRow[] = [];

  for (const quote of quotes) {
    if (seen.has(quote.coin_id)) {
      logger.warn(`Duplicate quote for ${quote.coin_id} ignored`);
      continue;
    }
    seen.add(quote.coin_id);
    rows.push({
      ...quote,
      ...EMPTY_METRICS,
      extracted_date: toExtractedDate(runDate),
      extracted_timestamp: runDate.toISOString(),
    });
  }
  return rows;
}

/**
 * Computes every metric for one extraction and joins the per-coin results onto
 * the quotes. Joins are left joins on coin id in a fixed order: dominance,
 * volatility, Sharpe ratio, Fear & Greed. Metric rows for coins without a
 * quote are dropped. The correlation matrix is returned separately.
 */
export class MetricsAggregator {
  constructor(private readonly calculator: MetricsCalculator) {}

  transformAllData(extracted: ExtractedData, runDate: Date = new Date()): TransformedData {
    const { currentQuotes, globalSnapshot, historicalSeries } = extracted;

    if (currentQuotes.length === 0) {
      throw new TransformError('No current quotes to transform');
    }

    logger.info('Starting full data transformation', {
      quotes: currentQuotes.length,
      historicalSeries: historicalSeries.length,
    });

    const marketDominance = this.calculator.calculateMarketDominance(currentQuotes, globalSnapshot);
    const volatility = this.calculator.calculateVolatility(historicalSeries);
    const correlationMatrix = this.calculator.calculateCorrelationMatrix(historicalSeries);
    const sharpeRatio = this.calculator.calculateSharpeRatio(historicalSeries);
    const fearGreed = this.calculator.calculateFearGreedScore(historicalSeries);

    let factTable = buildBaseRows(currentQuotes, runDate);
    factTable = joinDominance(factTable, marketDominance);
    factTable = joinVolatility(factTable, volatility);
    factTable = joinSharpe(factTable, sharpeRatio);
    factTable = joinFearGreed(factTable, fearGreed);

    logger.info(`Transformation complete. Fact table has ${factTable.length} rows`);

    return { marketDominance, volatility, correlationMatrix, sharpeRatio, fearGreed, factTable };
  }
}
