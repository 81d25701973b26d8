import { expect } from 'chai';
import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { MetricsAggregator } from '../src/core/analysis/aggregator';
import { MetricsCalculator } from '../src/core/analysis/metrics-calculator';
import { PersistenceError } from '../src/core/errors';
import { SQLiteManager } from '../src/core/storage/sqlite-manager';
import { TransformedData } from '../src/types/crypto';
import { makeExtractedData, makeSeries } from './fixtures';

describe('SQLiteManager', () => {
  let storage: SQLiteManager;
  let transformed: TransformedData;
  const extractedDate = '2024-01-31';

  beforeEach(() => {
    storage = new SQLiteManager(':memory:');
    const aggregator = new MetricsAggregator(new MetricsCalculator({ volatilityWindow: 7, riskFreeRate: 0.02 }));
    transformed = aggregator.transformAllData(makeExtractedData(), new Date('2024-01-31T12:00:00.000Z'));
  });

  afterEach(() => {
    storage.close();
  });

  it('should create the schema', () => {
    expect(storage.listTables()).to.include.members([
      'correlation_matrix',
      'dim_cryptocurrency',
      'etl_run_log',
      'fact_crypto_metrics',
    ]);
  });

  it('should store and read back fact rows', () => {
    const inserted = storage.insertFactMetrics(transformed.factTable, extractedDate);
    const rows = storage.getFactRows(extractedDate);

    expect(inserted).to.equal(2);
    expect(rows).to.have.length(2);
    expect(rows[0].coin_id).to.equal('bitcoin');
    expect(rows[0].market_dominance_pct).to.equal(50);
    expect(rows[0].sentiment).to.equal(transformed.factTable[0].sentiment);
  });

  it('should replace rows when the same date is loaded twice', () => {
    storage.insertFactMetrics(transformed.factTable, extractedDate);
    storage.insertCorrelationMatrix(transformed.correlationMatrix, extractedDate);

    const updated = transformed.factTable.map(row => ({ ...row, current_price: 1 }));
    storage.insertFactMetrics(updated, extractedDate);
    storage.insertCorrelationMatrix(transformed.correlationMatrix, extractedDate);

    expect(storage.countFactRows(extractedDate)).to.equal(2);
    expect(storage.getFactRows(extractedDate).map(row => row.current_price)).to.deep.equal([1, 1]);
    expect(storage.getCorrelations(extractedDate)).to.have.length(2);
  });

  it('should keep other dates untouched', () => {
    storage.insertFactMetrics(transformed.factTable, '2024-01-30');
    storage.insertFactMetrics(transformed.factTable, extractedDate);

    expect(storage.countFactRows('2024-01-30')).to.equal(2);
    expect(storage.countFactRows(extractedDate)).to.equal(2);
  });

  it('should store both orderings of each correlation pair', () => {
    const inserted = storage.insertCorrelationMatrix(
      { coinIds: ['a', 'b'], values: [[1, null], [null, 1]] },
      extractedDate
    );

    expect(inserted).to.equal(2);
    expect(storage.getCorrelations(extractedDate)).to.deep.equal([
      { coin_id_1: 'a', coin_id_2: 'b', correlation_coefficient: null },
      { coin_id_1: 'b', coin_id_2: 'a', correlation_coefficient: null },
    ]);
  });

  it('should skip empty inputs and clear stored pairs for the date', () => {
    storage.insertCorrelationMatrix(transformed.correlationMatrix, extractedDate);

    expect(storage.insertFactMetrics([], extractedDate)).to.equal(0);
    expect(storage.insertCorrelationMatrix({ coinIds: [], values: [] }, extractedDate)).to.equal(0);
    expect(storage.getCorrelations(extractedDate)).to.deep.equal([]);
  });

  it('should drop earlier pairs when a date is reloaded with a single coin', () => {
    const calculator = new MetricsCalculator({ volatilityWindow: 7, riskFreeRate: 0.02 });
    const pair = calculator.calculateCorrelationMatrix([
      makeSeries('a', [100, 110, 99, 108.9]),
      makeSeries('b', [200, 220, 198, 217.8]),
    ]);
    const single = calculator.calculateCorrelationMatrix([makeSeries('a', [100, 110, 99, 108.9])]);

    expect(storage.insertCorrelationMatrix(pair, extractedDate)).to.equal(2);
    expect(storage.insertCorrelationMatrix(single, extractedDate)).to.equal(0);
    expect(storage.getCorrelations(extractedDate)).to.have.length(0);
  });

  it('should upsert each coin once', () => {
    const rows = [
      { coin_id: 'a', name: 'Alpha', symbol: 'alp' },
      { coin_id: 'a', name: 'Alpha', symbol: 'alp' },
      { coin_id: 'b', name: 'Beta', symbol: 'bet' },
    ];
    expect(storage.upsertCryptocurrencies(rows)).to.equal(2);
    expect(storage.upsertCryptocurrencies(rows)).to.equal(2);
  });

  it('should report a dimension failure once, under the fact load', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crypto-metrics-'));
    const dbPath = path.join(dir, 'metrics.db');
    const fileStorage = new SQLiteManager(dbPath);
    const raw = new Database(dbPath);
    raw.exec(`
      CREATE TRIGGER reject_dimension BEFORE INSERT ON dim_cryptocurrency
      BEGIN SELECT RAISE(ABORT, 'dimension rejected'); END;
    `);
    raw.close();

    try {
      expect(() => fileStorage.insertFactMetrics(transformed.factTable, extractedDate)).to.throw(
        PersistenceError,
        /^Insert fact metrics failed: dimension rejected$/
      );
      expect(fileStorage.countFactRows(extractedDate)).to.equal(0);
    } finally {
      fileStorage.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should update a run log entry in place', () => {
    const runId = storage.startRun({ coins: ['bitcoin'] });
    expect(storage.getRun(runId)?.status).to.equal('RUNNING');

    storage.finishRun(runId, {
      status: 'FAILED',
      executionTimeSeconds: 1.5,
      errorMessage: 'boom',
      errorCategory: 'extraction',
    });
    const entry = storage.getRun(runId);

    expect(entry).to.include({
      run_id: runId,
      status: 'FAILED',
      records_inserted: 0,
      execution_time_seconds: 1.5,
      error_message: 'boom',
      error_category: 'extraction',
    });
    expect(entry?.metadata).to.deep.equal({ coins: ['bitcoin'] });
  });

  it('should return null for an unknown run', () => {
    expect(storage.getRun(999)).to.equal(null);
  });

  it('should raise a persistence error when a write fails', () => {
    storage.close();
    expect(() => storage.startRun()).to.throw(PersistenceError);
    storage = new SQLiteManager(':memory:');
  });
});
