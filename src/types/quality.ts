export type CellValue = string | number | boolean | Date | null | undefined;

/** A flat record set row, addressed by column name. */
export type DataRecord = Readonly<Record<string, CellValue>>;

interface BaseCheckResult {
  passed: boolean;
  error?: string;
  warning?: string;
}

export interface NullCheckResult extends BaseCheckResult {
  check: 'null_values';
  table: string;
  total_rows: number;
  null_counts: Record<string, number>;
  /** Column name to null percentage (0-100) for the columns over the limit. */
  failed_columns: Record<string, number>;
}

export interface PriceValidityResult extends BaseCheckResult {
  check: 'price_validity';
  min_price_threshold: number;
  invalid_count: number;
  invalid_coins: string[];
}

export interface PriceAnomaly {
  coin_id: string;
  column: string;
  value: number;
}

export interface AnomalyCheckResult extends BaseCheckResult {
  check: 'price_change_anomalies';
  threshold: number;
  anomaly_count: number;
  anomalies: PriceAnomaly[];
}

export interface DuplicateCheckResult extends BaseCheckResult {
  check: 'duplicate_records';
  key_columns: string[];
  duplicate_count: number;
  duplicate_keys: CellValue[][];
}

export interface FreshnessCheckResult extends BaseCheckResult {
  check: 'data_freshness';
  latest_timestamp: string | null;
  age_hours: number | null;
  threshold_hours: number;
}

export type CheckResult =
  | NullCheckResult
  | PriceValidityResult
  | AnomalyCheckResult
  | DuplicateCheckResult
  | FreshnessCheckResult;

export interface QualityReport {
  table_name: string;
  total_rows: number;
  checks: CheckResult[];
  all_passed: boolean;
  passed_count: number;
  total_checks: number;
}
