import { PRICE_CHANGE_COLUMNS, QUALITY_CONFIG } from '../../config/constants';
import { QualityConfig } from '../../config/pipeline-config';
import {
  AnomalyCheckResult,
  CellValue,
  CheckResult,
  DataRecord,
  DuplicateCheckResult,
  FreshnessCheckResult,
  NullCheckResult,
  PriceAnomaly,
  PriceValidityResult,
  QualityReport,
} from '../../types/quality';
import { createLogger } from '../../utils/logger';

const logger = createLogger('DataQualityChecker');

const ID_COLUMN = 'coin_id';
const MS_PER_HOUR = 60 * 60 * 1000;

function isNull(value: CellValue): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

function hasColumn(records: readonly DataRecord[], column: string): boolean {
  return records.some(record => Object.prototype.hasOwnProperty.call(record, column));
}

function columnsOf(records: readonly DataRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    Object.keys(record).forEach(column => columns.add(column));
  }
  return [...columns];
}

function idOf(record: DataRecord): string | null {
  const id = record[ID_COLUMN];
  return typeof id === 'string' ? id : null;
}

function toDate(value: CellValue): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  return null;
}

function keyPart(value: CellValue): CellValue {
  if (value instanceof Date) return value.toISOString();
  return isNull(value) ? null : value;
}

/**
 * Advisory validation rules over a flat record set. Each check runs
 * independently and reports its own diagnostics; none of them throw.
 */
export class DataQualityChecker {
  constructor(
    private readonly config: QualityConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Fails for any column whose null share exceeds `maxNullPercentage`.
   * An empty record set is reported as a failure.
   */
  checkNullValues(records: readonly DataRecord[], tableName: string = 'data'): NullCheckResult {
    if (records.length === 0) {
      logger.warn(`${tableName}: record set is empty`);
      return {
        check: 'null_values',
        table: tableName,
        passed: false,
        error: 'Empty input',
        total_rows: 0,
        null_counts: {},
        failed_columns: {},
      };
    }

    const nullCounts: Record<string, number> = {};
    const failedColumns: Record<string, number> = {};

    for (const column of columnsOf(records)) {
      const nullCount = records.filter(record => isNull(record[column])).length;
      nullCounts[column] = nullCount;
      if (nullCount / records.length > this.config.maxNullPercentage) {
        failedColumns[column] = (nullCount / records.length) * 100;
      }
    }

    const result: NullCheckResult = {
      check: 'null_values',
      table: tableName,
      passed: Object.keys(failedColumns).length === 0,
      total_rows: records.length,
      null_counts: nullCounts,
      failed_columns: failedColumns,
    };

    if (result.passed) {
      logger.info(`${tableName}: Null value check passed`);
    } else {
      logger.warn(`${tableName}: Null value check failed`, { failedColumns });
    }
    return result;
  }

  /** Fails for any row whose price is at or below `minPriceValue`. */
  checkPriceValidity(records: readonly DataRecord[], priceColumn: string = 'current_price'): PriceValidityResult {
    const minPrice = this.config.minPriceValue;

    if (!hasColumn(records, priceColumn)) {
      logger.warn(`Price column '${priceColumn}' not found`);
      return {
        check: 'price_validity',
        passed: false,
        error: `Column ${priceColumn} not found`,
        min_price_threshold: minPrice,
        invalid_count: 0,
        invalid_coins: [],
      };
    }

    const invalid = records.filter(record => {
      const price = record[priceColumn];
      return typeof price === 'number' && price <= minPrice;
    });

    const result: PriceValidityResult = {
      check: 'price_validity',
      passed: invalid.length === 0,
      min_price_threshold: minPrice,
      invalid_count: invalid.length,
      invalid_coins: invalid.map(idOf).filter((id): id is string => id !== null),
    };

    if (result.passed) {
      logger.info('Price validity check passed');
    } else {
      logger.warn('Price validity check failed', { invalidCoins: result.invalid_coins });
    }
    return result;
  }

  /**
   * Flags percentage changes outside +/- `maxPriceChangePercentage` in the
   * 24h, 7d and 30d columns that are present. Only the first anomalies are
   * listed; `anomaly_count` holds the full count.
   */
  checkPriceChangeAnomalies(records: readonly DataRecord[]): AnomalyCheckResult {
    const threshold = this.config.maxPriceChangePercentage;
    const anomalies: PriceAnomaly[] = [];

    for (const column of PRICE_CHANGE_COLUMNS) {
      if (!hasColumn(records, column)) continue;

      for (const record of records) {
        const value = record[column];
        if (typeof value === 'number' && (value > threshold || value < -threshold)) {
          anomalies.push({ coin_id: idOf(record) ?? '', column, value });
        }
      }
    }

    const result: AnomalyCheckResult = {
      check: 'price_change_anomalies',
      passed: anomalies.length === 0,
      threshold,
      anomaly_count: anomalies.length,
      anomalies: anomalies.slice(0, QUALITY_CONFIG.maxReportedAnomalies),
    };

    if (result.passed) {
      logger.info('Price change anomaly check passed');
    } else {
      logger.warn(`Found ${anomalies.length} price change anomalies`, { anomalies: result.anomalies });
    }
    return result;
  }

  /**
   * Fails if any combination of `keyColumns` repeats. Every row taking part in
   * a repeat is reported, including the first occurrence.
   */
  checkDuplicateRecords(records: readonly DataRecord[], keyColumns: string[] = [ID_COLUMN]): DuplicateCheckResult {
    const existingKeys = keyColumns.filter(column => hasColumn(records, column));

    if (existingKeys.length === 0) {
      logger.warn(`None of the key columns ${keyColumns.join(', ')} found`);
      return {
        check: 'duplicate_records',
        passed: true,
        warning: 'No key columns to check',
        key_columns: [],
        duplicate_count: 0,
        duplicate_keys: [],
      };
    }

    const keysOf = (record: DataRecord) => existingKeys.map(column => keyPart(record[column]));
    const occurrences = new Map<string, number>();
    for (const record of records) {
      const key = JSON.stringify(keysOf(record));
      occurrences.set(key, (occurrences.get(key) ?? 0) + 1);
    }

    const duplicates = records.filter(record => (occurrences.get(JSON.stringify(keysOf(record))) ?? 0) > 1);

    const result: DuplicateCheckResult = {
      check: 'duplicate_records',
      passed: duplicates.length === 0,
      key_columns: existingKeys,
      duplicate_count: duplicates.length,
      duplicate_keys: duplicates.map(keysOf),
    };

    if (result.passed) {
      logger.info('Duplicate check passed');
    } else {
      logger.warn(`Found ${duplicates.length} duplicate records`, { keyColumns: existingKeys });
    }
    return result;
  }

  /**
   * Fails when the newest timestamp is `freshnessThresholdHours` old or more.
   * A missing timestamp column is skipped and reported as passed with a warning.
   */
  checkDataFreshness(records: readonly DataRecord[], timestampColumn: string = 'extracted_at'): FreshnessCheckResult {
    const thresholdHours = this.config.freshnessThresholdHours;
    const base = { check: 'data_freshness' as const, threshold_hours: thresholdHours };

    if (!hasColumn(records, timestampColumn)) {
      logger.warn(`Timestamp column '${timestampColumn}' not found, skipping freshness check`);
      return { ...base, passed: true, warning: `Timestamp column '${timestampColumn}' not found`, latest_timestamp: null, age_hours: null };
    }

    const timestamps = records
      .map(record => record[timestampColumn])
      .filter(value => !isNull(value))
      .map(toDate);

    if (timestamps.some(date => date === null || Number.isNaN(date.getTime()))) {
      logger.error(`Error checking data freshness: unparseable value in '${timestampColumn}'`);
      return { ...base, passed: false, error: `Unparseable timestamp in '${timestampColumn}'`, latest_timestamp: null, age_hours: null };
    }

    const times = timestamps.map(date => (date ? date.getTime() : Number.NaN));
    if (times.length === 0) {
      logger.warn(`No timestamps in '${timestampColumn}'`);
      return { ...base, passed: false, error: `No timestamps in '${timestampColumn}'`, latest_timestamp: null, age_hours: null };
    }

    const latest = Math.max(...times);
    const ageHours = (this.now().getTime() - latest) / MS_PER_HOUR;
    const result: FreshnessCheckResult = {
      ...base,
      passed: ageHours < thresholdHours,
      latest_timestamp: new Date(latest).toISOString(),
      age_hours: ageHours,
    };

    if (result.passed) {
      logger.info(`Data freshness check passed (age: ${ageHours.toFixed(2)} hours)`);
    } else {
      logger.warn(`Data is stale (age: ${ageHours.toFixed(2)} hours)`, { latestTimestamp: result.latest_timestamp });
    }
    return result;
  }

  /**
   * Runs the null, duplicate and freshness checks, plus the price checks when
   * a `current_price` column exists. Every check runs regardless of earlier
   * failures.
   */
  runAllChecks(records: readonly DataRecord[], tableName: string = 'data'): QualityReport {
    logger.info(`Running data quality checks on ${tableName}`);

    const checks: CheckResult[] = [
      this.checkNullValues(records, tableName),
      this.checkDuplicateRecords(records),
      this.checkDataFreshness(records),
    ];

    if (hasColumn(records, 'current_price')) {
      checks.push(this.checkPriceValidity(records));
      checks.push(this.checkPriceChangeAnomalies(records));
    }

    const passedCount = checks.filter(check => check.passed).length;
    const report: QualityReport = {
      table_name: tableName,
      total_rows: records.length,
      checks,
      all_passed: passedCount === checks.length,
      passed_count: passedCount,
      total_checks: checks.length,
    };

    if (report.all_passed) {
      logger.info(`${tableName}: All quality checks passed`);
    } else {
      logger.warn(`${tableName}: Some quality checks failed`, { passed: passedCount, total: checks.length });
    }
    return report;
  }
}
