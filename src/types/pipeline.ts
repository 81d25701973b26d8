import { QualityReport } from './quality';

export type RunStatus = 'RUNNING' | 'SUCCESS' | 'FAILED';

export type ErrorCategory = 'extraction' | 'transform' | 'persistence' | 'config' | 'unknown';

export interface RunLogEntry {
  run_id: number;
  run_timestamp: string;
  status: RunStatus;
  coins_processed: number;
  records_inserted: number;
  records_updated: number;
  execution_time_seconds: number;
  error_message: string | null;
  error_category: ErrorCategory | null;
  metadata: Record<string, unknown> | null;
}

export interface RunCompletion {
  status: Exclude<RunStatus, 'RUNNING'>;
  coinsProcessed?: number;
  recordsInserted?: number;
  recordsUpdated?: number;
  executionTimeSeconds: number;
  errorMessage?: string;
  errorCategory?: ErrorCategory;
  metadata?: Record<string, unknown>;
}

export interface LoadStats {
  factMetrics: number;
  correlations: number;
  totalRecords: number;
}

interface BasePipelineResult {
  runId: number | null;
  extractedDate: string;
  executionTimeSeconds: number;
}

export interface SuccessfulPipelineResult extends BasePipelineResult {
  status: 'SUCCESS';
  coinsProcessed: number;
  recordsInserted: number;
  qualityPassed: boolean;
  qualityReport: QualityReport;
}

export interface FailedPipelineResult extends BasePipelineResult {
  status: 'FAILED';
  error: string;
  errorCategory: ErrorCategory;
}

export type PipelineResult = SuccessfulPipelineResult | FailedPipelineResult;
