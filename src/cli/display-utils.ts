import chalk from 'chalk';
import { getBorderCharacters, table } from 'table';
import { CheckResult, QualityReport } from '../types/quality';
import { PipelineResult, RunLogEntry } from '../types/pipeline';
import { SQLiteManager, StoredFactRow } from '../core/storage/sqlite-manager';
import { errorMessage } from '../core/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('DisplayUtils');

function formatNumber(value: unknown, digits: number = 2): string {
  if (typeof value !== 'number' || !Number.isFinite(value)) return '-';
  return value.toLocaleString('en-US', { maximumFractionDigits: digits });
}

function describeCheck(check: CheckResult): string {
  if (check.error) return check.error;
  if (check.warning) return check.warning;
  switch (check.check) {
    case 'null_values':
      return Object.keys(check.failed_columns).length > 0
        ? `Columns over limit: ${Object.entries(check.failed_columns)
            .map(([column, pct]) => `${column} (${pct.toFixed(1)}%)`)
            .join(', ')}`
        : `${check.total_rows} rows checked`;
    case 'price_validity':
      return check.invalid_count > 0 ? `Invalid: ${check.invalid_coins.join(', ')}` : 'All prices valid';
    case 'price_change_anomalies':
      return `${check.anomaly_count} anomalies beyond ±${check.threshold}%`;
    case 'duplicate_records':
      return `${check.duplicate_count} duplicate rows on ${check.key_columns.join(', ')}`;
    case 'data_freshness':
      return check.age_hours === null
        ? 'No timestamp'
        : `${check.age_hours.toFixed(2)}h old (limit ${check.threshold_hours}h)`;
  }
}

export function formatQualityReport(report: QualityReport): string {
  const rows = [
    [chalk.bold('Check'), chalk.bold('Result'), chalk.bold('Details')],
    ...report.checks.map(check => [
      check.check,
      check.passed ? chalk.green('PASS') : chalk.red('FAIL'),
      describeCheck(check),
    ]),
  ];
  const heading = `${chalk.bold('Data quality:')} ${report.passed_count}/${report.total_checks} checks passed on ${report.table_name} (${report.total_rows} rows)`;
  return `${heading}\n${table(rows, { border: getBorderCharacters('norc') })}`;
}

export function displayPipelineResult(result: PipelineResult): void {
  console.log(chalk.bold.blue('\nCrypto metrics pipeline'));
  console.log(chalk.blue('='.repeat(40)));
  console.log(`• Run: ${chalk.cyan(result.runId ?? 'n/a')}`);
  console.log(`• Date: ${chalk.yellow(result.extractedDate)}`);
  console.log(`• Duration: ${result.executionTimeSeconds.toFixed(2)}s`);

  if (result.status === 'FAILED') {
    console.log(`• Status: ${chalk.bold.red('FAILED')} ${chalk.gray(`[${result.errorCategory}]`)}`);
    console.log(`• Error: ${chalk.red(result.error)}`);
    return;
  }

  console.log(`• Status: ${chalk.bold.green('SUCCESS')}`);
  console.log(`• Coins processed: ${chalk.cyan(result.coinsProcessed)}`);
  console.log(`• Records inserted: ${chalk.cyan(result.recordsInserted)}`);
  console.log(`\n${formatQualityReport(result.qualityReport)}`);
}

/** Per-coin headline metrics for one extraction date. */
export function formatFactTable(rows: readonly StoredFactRow[]): string {
  const header = ['Coin', 'Price', 'Dominance %', 'Vol 30d', 'Sharpe', 'Fear & Greed', 'Sentiment'].map(label =>
    chalk.bold(label)
  );
  const body = rows.map(row => [
    String(row.coin_id),
    formatNumber(row.current_price, 4),
    formatNumber(row.market_dominance_pct),
    formatNumber(row.volatility_30d, 4),
    formatNumber(row.sharpe_ratio, 3),
    formatNumber(row.fear_greed_score, 1),
    typeof row.sentiment === 'string' ? row.sentiment : '-',
  ]);
  return table([header, ...body], { border: getBorderCharacters('ramac') });
}

export function displayRunLog(entry: RunLogEntry): void {
  const status =
    entry.status === 'SUCCESS' ? chalk.green(entry.status) : entry.status === 'FAILED' ? chalk.red(entry.status) : chalk.yellow(entry.status);
  console.log(
    `Run ${entry.run_id} at ${entry.run_timestamp}: ${status}, ${entry.records_inserted} records in ${entry.execution_time_seconds.toFixed(2)}s`
  );
  if (entry.error_message) {
    console.log(chalk.red(`  ${entry.error_category ?? 'unknown'}: ${entry.error_message}`));
  }
}

/**
 * Prints the stored fact rows and run log entry for a finished run. Read
 * failures are logged and do not change the run outcome.
 */
export function showStoredRun(storage: Pick<SQLiteManager, 'getFactRows' | 'getRun'>, result: PipelineResult): void {
  try {
    if (result.status === 'SUCCESS') {
      console.log(formatFactTable(storage.getFactRows(result.extractedDate)));
    }
    if (result.runId !== null) {
      const entry = storage.getRun(result.runId);
      if (entry) displayRunLog(entry);
    }
  } catch (error) {
    logger.error('Could not display stored run', { runId: result.runId, error: errorMessage(error) });
  }
}
