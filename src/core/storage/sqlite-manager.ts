import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { DEFAULT_DATABASE_PATH } from '../../config/constants';
import { CorrelationMatrix, CorrelationRow, FactRow } from '../../types/crypto';
import { ErrorCategory, RunCompletion, RunLogEntry, RunStatus } from '../../types/pipeline';
import { createLogger } from '../../utils/logger';
import { toCorrelationRows } from '../analysis/metrics-calculator';
import { PersistenceError, errorMessage } from '../errors';

const logger = createLogger('SQLiteManager');

type SqlValue = string | number | null;

/** A fact table row as read back from storage. */
export type StoredFactRow = Record<string, SqlValue>;

export const FACT_COLUMNS = [
  'coin_id',
  'extracted_date',
  'extracted_timestamp',
  'extracted_at',
  'current_price',
  'market_cap',
  'market_cap_rank',
  'total_volume',
  'circulating_supply',
  'price_change_24h',
  'price_change_percentage_24h',
  'price_change_percentage_7d',
  'price_change_percentage_30d',
  'market_dominance_pct',
  'dominance_rank',
  'volatility_7d',
  'volatility_30d',
  'volatility_window',
  'price_change_30d_pct',
  'avg_price_30d',
  'max_price_30d',
  'min_price_30d',
  'observation_count',
  'sharpe_ratio',
  'annualized_return',
  'annualized_volatility',
  'fear_greed_score',
  'sentiment',
  'momentum_component',
  'volatility_component',
  'volume_component',
  'ath',
  'ath_change_percentage',
  'ath_date',
  'atl',
  'atl_change_percentage',
  'atl_date',
] as const satisfies ReadonlyArray<keyof FactRow>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS dim_cryptocurrency (
    crypto_key INTEGER PRIMARY KEY AUTOINCREMENT,
    coin_id TEXT UNIQUE NOT NULL,
    name TEXT NOT NULL,
    symbol TEXT NOT NULL,
    first_seen_date DATETIME DEFAULT CURRENT_TIMESTAMP,
    last_updated DATETIME DEFAULT CURRENT_TIMESTAMP,
    is_active BOOLEAN DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS fact_crypto_metrics (
    metric_id INTEGER PRIMARY KEY AUTOINCREMENT,
    coin_id TEXT NOT NULL REFERENCES dim_cryptocurrency(coin_id),
    extracted_date DATE NOT NULL,
    extracted_timestamp DATETIME NOT NULL,
    extracted_at DATETIME,
    current_price REAL,
    market_cap REAL,
    market_cap_rank INTEGER,
    total_volume REAL,
    circulating_supply REAL,
    price_change_24h REAL,
    price_change_percentage_24h REAL,
    price_change_percentage_7d REAL,
    price_change_percentage_30d REAL,
    market_dominance_pct REAL,
    dominance_rank INTEGER,
    volatility_7d REAL,
    volatility_30d REAL,
    volatility_window INTEGER,
    price_change_30d_pct REAL,
    avg_price_30d REAL,
    max_price_30d REAL,
    min_price_30d REAL,
    observation_count INTEGER,
    sharpe_ratio REAL,
    annualized_return REAL,
    annualized_volatility REAL,
    fear_greed_score REAL,
    sentiment TEXT,
    momentum_component REAL,
    volatility_component REAL,
    volume_component REAL,
    ath REAL,
    ath_change_percentage REAL,
    ath_date DATETIME,
    atl REAL,
    atl_change_percentage REAL,
    atl_date DATETIME,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    UNIQUE (coin_id, extracted_date)
  );

  CREATE TABLE IF NOT EXISTS correlation_matrix (
    correlation_id INTEGER PRIMARY KEY AUTOINCREMENT,
    extracted_date DATE NOT NULL,
    coin_id_1 TEXT NOT NULL,
    coin_id_2 TEXT NOT NULL,
    correlation_coefficient REAL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    UNIQUE (extracted_date, coin_id_1, coin_id_2)
  );

  CREATE TABLE IF NOT EXISTS etl_run_log (
    run_id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
    status TEXT NOT NULL CHECK (status IN ('RUNNING', 'SUCCESS', 'FAILED')),
    coins_processed INTEGER NOT NULL DEFAULT 0,
    records_inserted INTEGER NOT NULL DEFAULT 0,
    records_updated INTEGER NOT NULL DEFAULT 0,
    execution_time_seconds REAL NOT NULL DEFAULT 0,
    error_message TEXT,
    error_category TEXT,
    metadata TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_fact_metrics_date ON fact_crypto_metrics(extracted_date);
  CREATE INDEX IF NOT EXISTS idx_correlation_date ON correlation_matrix(extracted_date);
  CREATE INDEX IF NOT EXISTS idx_etl_log_timestamp ON etl_run_log(run_timestamp);
`;

interface RunLogRow {
  run_id: number;
  run_timestamp: string;
  status: string;
  coins_processed: number;
  records_inserted: number;
  records_updated: number;
  execution_time_seconds: number;
  error_message: string | null;
  error_category: string | null;
  metadata: string | null;
}

const RUN_STATUSES: readonly RunStatus[] = ['RUNNING', 'SUCCESS', 'FAILED'];
const ERROR_CATEGORIES: readonly ErrorCategory[] = ['extraction', 'transform', 'persistence', 'config', 'unknown'];

function parseMetadata(text: string | null): Record<string, unknown> | null {
  if (text === null) return null;
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Relational store for dated metric snapshots. Writes for an extraction date
 * replace whatever was stored for that date, so reloading a date is idempotent.
 */
export class SQLiteManager {
  private db: Database.Database;

  constructor(dbPath: string = DEFAULT_DATABASE_PATH) {
    try {
      if (dbPath !== ':memory:') {
        this.ensureDirectoryExists(path.dirname(dbPath));
      }
      this.db = new Database(dbPath);
      this.db.pragma('foreign_keys = ON');
      this.initializeSchema();
    } catch (error) {
      throw new PersistenceError(`Failed to open database at ${dbPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private ensureDirectoryExists(dir: string) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info(`Created directory: ${dir}`);
    }
  }

  initializeSchema() {
    this.db.exec(SCHEMA);
    logger.debug('Database schema initialized');
  }

  listTables(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map(row => row.name);
  }

  private withPersistenceError<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      logger.error(`${operation} failed`, { error: errorMessage(error) });
      throw new PersistenceError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  upsertCryptocurrencies(rows: ReadonlyArray<Pick<FactRow, 'coin_id' | 'name' | 'symbol'>>): number {
    return this.withPersistenceError('Upsert cryptocurrencies', () => {
      const count = this.db.transaction(() => this.writeCryptocurrencies(rows))();
      logger.info(`Upserted ${count} cryptocurrency records`);
      return count;
    });
  }

  private writeCryptocurrencies(rows: ReadonlyArray<Pick<FactRow, 'coin_id' | 'name' | 'symbol'>>): number {
    const stmt = this.db.prepare<{ coin_id: string; name: string; symbol: string }>(`
      INSERT INTO dim_cryptocurrency (coin_id, name, symbol)
      VALUES (@coin_id, @name, @symbol)
      ON CONFLICT (coin_id) DO UPDATE SET
        name = excluded.name,
        symbol = excluded.symbol,
        last_updated = CURRENT_TIMESTAMP
    `);
    const seen = new Set<string>();
    for (const row of rows) {
      if (seen.has(row.coin_id)) continue;
      seen.add(row.coin_id);
      stmt.run({ coin_id: row.coin_id, name: row.name, symbol: row.symbol });
    }
    return seen.size;
  }

  /**
   * Replaces the fact rows stored for `extractedDate` with `rows`.
   * @returns number of rows inserted
   */
  insertFactMetrics(rows: readonly FactRow[], extractedDate: string): number {
    if (rows.length === 0) {
      logger.warn('Empty fact table provided, nothing to insert');
      return 0;
    }

    const columns = FACT_COLUMNS.join(', ');
    const placeholders = FACT_COLUMNS.map(column => `@${column}`).join(', ');

    return this.withPersistenceError('Insert fact metrics', () => {
      const insert = this.db.prepare<Record<string, SqlValue>>(
        `INSERT INTO fact_crypto_metrics (${columns}) VALUES (${placeholders})`
      );
      const remove = this.db.prepare<[string]>('DELETE FROM fact_crypto_metrics WHERE extracted_date = ?');
      const replace = this.db.transaction(() => {
        this.writeCryptocurrencies(rows);
        const deleted = remove.run(extractedDate).changes;
        if (deleted > 0) {
          logger.info(`Deleted ${deleted} existing records for ${extractedDate}`);
        }
        for (const row of rows) {
          const params: Record<string, SqlValue> = {};
          for (const column of FACT_COLUMNS) {
            params[column] = row[column];
          }
          params.extracted_date = extractedDate;
          insert.run(params);
        }
        return rows.length;
      });
      const inserted = replace();
      logger.info(`Inserted ${inserted} fact metric records for ${extractedDate}`);
      return inserted;
    });
  }

  /**
   * Replaces the correlation pairs stored for `extractedDate`. The diagonal is
   * not stored; both orderings of each pair are. A matrix without pairs still
   * clears the date.
   */
  insertCorrelationMatrix(matrix: CorrelationMatrix, extractedDate: string): number {
    const rows = toCorrelationRows(matrix, extractedDate);
    if (rows.length === 0) {
      logger.warn('Correlation matrix has no coin pairs, clearing stored pairs only', { extractedDate });
    }

    return this.withPersistenceError('Insert correlation matrix', () => {
      const insert = this.db.prepare<CorrelationRow>(`
        INSERT INTO correlation_matrix (extracted_date, coin_id_1, coin_id_2, correlation_coefficient)
        VALUES (@extracted_date, @coin_id_1, @coin_id_2, @correlation_coefficient)
      `);
      const remove = this.db.prepare<[string]>('DELETE FROM correlation_matrix WHERE extracted_date = ?');
      const replace = this.db.transaction(() => {
        remove.run(extractedDate);
        for (const row of rows) {
          insert.run(row);
        }
        return rows.length;
      });
      const inserted = replace();
      logger.info(`Inserted ${inserted} correlation records`);
      return inserted;
    });
  }

  /** Records a RUNNING entry and returns its id. */
  startRun(metadata: Record<string, unknown> = {}): number {
    return this.withPersistenceError('Start run log', () => {
      const result = this.db
        .prepare<[string]>("INSERT INTO etl_run_log (status, metadata) VALUES ('RUNNING', ?)")
        .run(JSON.stringify(metadata));
      const runId = Number(result.lastInsertRowid);
      logger.info(`ETL run logged: RUNNING`, { runId });
      return runId;
    });
  }

  finishRun(runId: number, completion: RunCompletion): void {
    this.withPersistenceError('Finish run log', () => {
      this.db
        .prepare<{
          run_id: number;
          status: string;
          coins_processed: number;
          records_inserted: number;
          records_updated: number;
          execution_time_seconds: number;
          error_message: string | null;
          error_category: string | null;
          metadata: string | null;
        }>(`
          UPDATE etl_run_log SET
            status = @status,
            coins_processed = @coins_processed,
            records_inserted = @records_inserted,
            records_updated = @records_updated,
            execution_time_seconds = @execution_time_seconds,
            error_message = @error_message,
            error_category = @error_category,
            metadata = COALESCE(@metadata, metadata)
          WHERE run_id = @run_id
        `)
        .run({
          run_id: runId,
          status: completion.status,
          coins_processed: completion.coinsProcessed ?? 0,
          records_inserted: completion.recordsInserted ?? 0,
          records_updated: completion.recordsUpdated ?? 0,
          execution_time_seconds: completion.executionTimeSeconds,
          error_message: completion.errorMessage ?? null,
          error_category: completion.errorCategory ?? null,
          metadata: completion.metadata ? JSON.stringify(completion.metadata) : null,
        });
      logger.info(`ETL run logged: ${completion.status}`, { runId });
    });
  }

  getRun(runId: number): RunLogEntry | null {
    const row = this.db.prepare<[number], RunLogRow>('SELECT * FROM etl_run_log WHERE run_id = ?').get(runId);
    if (!row) return null;

    const status = RUN_STATUSES.find(value => value === row.status);
    if (!status) {
      throw new PersistenceError(`Run ${runId} has unknown status ${row.status}`);
    }

    return {
      run_id: row.run_id,
      run_timestamp: row.run_timestamp,
      status,
      coins_processed: row.coins_processed,
      records_inserted: row.records_inserted,
      records_updated: row.records_updated,
      execution_time_seconds: row.execution_time_seconds,
      error_message: row.error_message,
      error_category: ERROR_CATEGORIES.find(value => value === row.error_category) ?? null,
      metadata: parseMetadata(row.metadata),
    };
  }

  countFactRows(extractedDate: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM fact_crypto_metrics WHERE extracted_date = ?')
      .get(extractedDate);
    return row ? row.count : 0;
  }

  getFactRows(extractedDate: string): StoredFactRow[] {
    return this.db
      .prepare<[string], StoredFactRow>(
        `SELECT ${FACT_COLUMNS.join(', ')} FROM fact_crypto_metrics WHERE extracted_date = ? ORDER BY coin_id`
      )
      .all(extractedDate);
  }

  getCorrelations(extractedDate: string): { coin_id_1: string; coin_id_2: string; correlation_coefficient: number | null }[] {
    return this.db
      .prepare<[string], { coin_id_1: string; coin_id_2: string; correlation_coefficient: number | null }>(
        `SELECT coin_id_1, coin_id_2, correlation_coefficient FROM correlation_matrix
         WHERE extracted_date = ? ORDER BY coin_id_1, coin_id_2`
      )
      .all(extractedDate);
  }

  close() {
    this.db.close();
  }
}
