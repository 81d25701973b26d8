import { PipelineConfig } from '../../config/pipeline-config';
import { FACT_TABLE_NAME } from '../../config/constants';
import { TransformedData } from '../../types/crypto';
import { LoadStats, PipelineResult } from '../../types/pipeline';
import { createLogger } from '../../utils/logger';
import { timed } from '../../utils/instrumentation';
import { MetricsAggregator, toExtractedDate } from '../analysis/aggregator';
import { DataQualityChecker } from '../analysis/data-quality';
import { Extractor } from '../fetcher/data-fetcher';
import { SQLiteManager } from '../storage/sqlite-manager';
import { categorizeError, errorMessage } from '../errors';

const logger = createLogger('EtlPipeline');

export type MetricsStore = Pick<
  SQLiteManager,
  'startRun' | 'finishRun' | 'insertFactMetrics' | 'insertCorrelationMatrix'
>;

export interface EtlPipelineDeps {
  extractor: Extractor;
  aggregator: MetricsAggregator;
  qualityChecker: DataQualityChecker;
  storage: MetricsStore;
  clock?: () => Date;
}

/**
 * One extract, transform, validate and load pass. Quality failures are logged
 * and recorded but do not stop the load.
 */
export class EtlPipeline {
  private readonly clock: () => Date;

  constructor(private readonly config: PipelineConfig, private readonly deps: EtlPipelineDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private load(transformed: TransformedData, extractedDate: string): LoadStats {
    const { storage } = this.deps;
    const factMetrics = storage.insertFactMetrics(transformed.factTable, extractedDate);
    const correlations = storage.insertCorrelationMatrix(transformed.correlationMatrix, extractedDate);
    return { factMetrics, correlations, totalRecords: factMetrics + correlations };
  }

  private elapsedSeconds(startedAt: Date): number {
    return (this.clock().getTime() - startedAt.getTime()) / 1000;
  }

  async run(): Promise<PipelineResult> {
    const { extractor, aggregator, qualityChecker, storage } = this.deps;
    const startedAt = this.clock();
    const extractedDate = toExtractedDate(startedAt);
    let runId: number | null = null;

    logger.info('='.repeat(60));
    logger.info('Starting crypto metrics ETL pipeline', { extractedDate, coins: this.config.coins.length });

    try {
      runId = storage.startRun({ coins: this.config.coins, vsCurrency: this.config.vsCurrency });

      const extracted = await timed(logger, 'Extract', () => extractor.extractAllData());
      const transformed = await timed(logger, 'Transform', () => aggregator.transformAllData(extracted, startedAt));
      const qualityReport = await timed(logger, 'Validate', () =>
        qualityChecker.runAllChecks(transformed.factTable, FACT_TABLE_NAME)
      );
      if (!qualityReport.all_passed) {
        logger.warn('Data quality issues detected, continuing with load', {
          passed: qualityReport.passed_count,
          total: qualityReport.total_checks,
        });
      }

      const stats = await timed(logger, 'Load', () => this.load(transformed, extractedDate));
      const executionTimeSeconds = this.elapsedSeconds(startedAt);
      const coinsProcessed = transformed.factTable.length;

      storage.finishRun(runId, {
        status: 'SUCCESS',
        coinsProcessed,
        recordsInserted: stats.totalRecords,
        executionTimeSeconds,
        metadata: {
          extractedDate,
          signature: extracted.signature,
          factMetrics: stats.factMetrics,
          correlations: stats.correlations,
          qualityPassed: qualityReport.all_passed,
          qualityChecksPassed: `${qualityReport.passed_count}/${qualityReport.total_checks}`,
        },
      });

      logger.info('ETL pipeline completed successfully', { runId, executionTimeSeconds, coinsProcessed });
      return {
        status: 'SUCCESS',
        runId,
        extractedDate,
        executionTimeSeconds,
        coinsProcessed,
        recordsInserted: stats.totalRecords,
        qualityPassed: qualityReport.all_passed,
        qualityReport,
      };
    } catch (error) {
      const executionTimeSeconds = this.elapsedSeconds(startedAt);
      const message = errorMessage(error);
      const errorCategory = categorizeError(error);
      logger.error('ETL pipeline failed', { runId, errorCategory, error: message });

      if (runId !== null) {
        try {
          storage.finishRun(runId, { status: 'FAILED', executionTimeSeconds, errorMessage: message, errorCategory });
        } catch (logError) {
          logger.error('Could not record failed run', { runId, error: errorMessage(logError) });
        }
      }

      return { status: 'FAILED', runId, extractedDate, executionTimeSeconds, error: message, errorCategory };
    }
  }
}
