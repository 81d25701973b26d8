#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { displayPipelineResult, showStoredRun } from './cli/display-utils';
import { PipelineConfig, loadPipelineConfig } from './config/pipeline-config';
import { MetricsAggregator } from './core/analysis/aggregator';
import { DataQualityChecker } from './core/analysis/data-quality';
import { MetricsCalculator } from './core/analysis/metrics-calculator';
import { errorMessage } from './core/errors';
import { CoinGeckoClient } from './core/fetcher/coingecko-client';
import { DataFetcher } from './core/fetcher/data-fetcher';
import { EtlPipeline } from './core/pipeline/etl-pipeline';
import { SQLiteManager } from './core/storage/sqlite-manager';
import { createLogger } from './utils/logger';

dotenv.config();

const logger = createLogger('Main');
const LOCK_FILE = process.env.LOCK_FILE || path.join(process.cwd(), 'pipeline.lock');

// Returns true when another live process holds the lock
function checkForRunningInstance(): boolean {
  if (fs.existsSync(LOCK_FILE)) {
    const pid = parseInt(fs.readFileSync(LOCK_FILE, 'utf-8').trim(), 10);
    try {
      process.kill(pid, 0);
      logger.error(`Another instance is already running with PID ${pid}. Exiting.`);
      return true;
    } catch (error) {
      logger.info(`Stale lock file found. Previous instance (PID ${pid}) is not running.`, {
        error: errorMessage(error),
      });
      fs.unlinkSync(LOCK_FILE);
    }
  }

  fs.writeFileSync(LOCK_FILE, process.pid.toString());
  return false;
}

function cleanupLockFile() {
  try {
    if (fs.existsSync(LOCK_FILE) && fs.readFileSync(LOCK_FILE, 'utf-8').trim() === process.pid.toString()) {
      fs.unlinkSync(LOCK_FILE);
      logger.info('Lock file removed');
    }
  } catch (error) {
    logger.error('Error cleaning up lock file', { error: errorMessage(error) });
  }
}

function buildPipeline(config: PipelineConfig) {
  const storage = new SQLiteManager(config.databasePath);
  const client = new CoinGeckoClient(config.api);
  const pipeline = new EtlPipeline(config, {
    extractor: new DataFetcher(client, config),
    aggregator: new MetricsAggregator(new MetricsCalculator(config.metrics)),
    qualityChecker: new DataQualityChecker(config.quality),
    storage,
  });
  return { pipeline, storage };
}

async function runOnce(config: PipelineConfig): Promise<boolean> {
  const { pipeline, storage } = buildPipeline(config);
  try {
    const result = await pipeline.run();
    displayPipelineResult(result);
    showStoredRun(storage, result);
    return result.status === 'SUCCESS';
  } finally {
    storage.close();
  }
}

async function schedule(config: PipelineConfig, intervalMinutes: number): Promise<boolean> {
  if (checkForRunningInstance()) {
    return false;
  }
  process.on('exit', cleanupLockFile);

  const { pipeline, storage } = buildPipeline(config);
  let running = false;

  const tick = async () => {
    if (running) {
      logger.warn('Previous run still in progress, skipping this interval');
      return;
    }
    running = true;
    try {
      displayPipelineResult(await pipeline.run());
    } finally {
      running = false;
    }
  };

  logger.info(`Scheduling pipeline every ${intervalMinutes} minutes`);
  await tick();

  const timer = setInterval(() => {
    tick().catch(error => logger.error('Scheduled run failed', { error: errorMessage(error) }));
  }, intervalMinutes * 60 * 1000);

  await new Promise<void>(resolve => {
    const stop = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}, stopping scheduler`);
      clearInterval(timer);
      resolve();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });

  storage.close();
  cleanupLockFile();
  return true;
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('crypto-metrics')
    .command(
      ['run', '$0'],
      'Run the ETL pipeline once',
      () => {},
      async () => {
        const ok = await runOnce(loadPipelineConfig());
        if (!ok) process.exitCode = 1;
      }
    )
    .command(
      'init-db',
      'Create the database schema',
      () => {},
      () => {
        const config = loadPipelineConfig();
        const storage = new SQLiteManager(config.databasePath);
        try {
          console.log(`Database ready at ${config.databasePath}: ${storage.listTables().join(', ')}`);
        } finally {
          storage.close();
        }
      }
    )
    .command(
      'schedule',
      'Run the ETL pipeline periodically',
      y =>
        y.option('interval', {
          alias: 'i',
          type: 'number',
          default: 60,
          describe: 'Minutes between runs',
        }),
      async argv => {
        if (!Number.isFinite(argv.interval) || argv.interval <= 0) {
          throw new Error('--interval must be a positive number of minutes');
        }
        const ok = await schedule(loadPipelineConfig(), argv.interval);
        if (!ok) process.exitCode = 1;
      }
    )
    .strict()
    .help()
    .parseAsync();
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Fatal error', { error: errorMessage(error) });
    cleanupLockFile();
    process.exit(1);
  });
}
