/**
 * Daily Stats Job
 *
 * One batch invocation: per-product counts (incremental or full
 * regeneration), then the series scheduler. A product that fails is logged
 * and reported; the remaining products and the series phase still run.
 *
 * @module @trailstats/core/job/daily-stats
 */

import fs from 'fs/promises';
import path from 'path';
import { loadCategoryDomain, type CategoryDomain } from '../categories/registry.js';
import { IncrementalCollector } from '../collection/incremental.js';
import { miningDir, type StatsConfig } from '../config/index.js';
import type { DatabaseContext } from '../database/connection.js';
import { errorMessage } from '../errors/index.js';
import {
  RegenerationEngine,
  loadReplayHistory,
  type RegenerationProgress,
} from '../reconstruction/regenerate.js';
import { SqliteQueryExecutor, type QueryExecutor } from '../series/query-executor.js';
import { SeriesScheduler, type SeriesRunSummary } from '../series/scheduler.js';
import type { StatsStores } from '../storage/interfaces.js';
import { createSqliteStores } from '../storage/sqlite.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { formatDuration, parseIsoDate } from '../time/days.js';
import { TimeSeriesStore } from '../timeseries/store.js';
import { listProductTargets, type ProductTarget } from './targets.js';

// =============================================================================
// Types
// =============================================================================

export type CollectionMode = 'incremental' | 'regenerate';

/**
 * Everything one run needs, passed explicitly to every component
 */
export interface StatsContext {
  config: StatsConfig;
  stores: StatsStores;
  executor: QueryExecutor;
  files: TimeSeriesStore;
  logger: Logger;
  now: () => Date;
}

export interface DailyStatsOptions {
  mode: CollectionMode;
  /** YYYY-MM-DD label for series data points; defaults to today */
  effectiveDate?: string;
  onProgress?: (progress: RegenerationProgress) => void;
}

export interface ProductOutcome {
  product: string;
  status: 'written' | 'skipped' | 'failed';
  /** How the file was written */
  write?: 'append' | 'rewrite';
  /** Rows written (rewrite) or 1 (append) */
  rows?: number;
  error?: string;
}

export interface DailyStatsResult {
  mode: CollectionMode;
  products: ProductOutcome[];
  series: SeriesRunSummary;
  removedChartImages: number;
  durationMs: number;
  /** HH:MM:SS */
  duration: string;
}

/**
 * Wire the SQLite stores and executor to a run's database handles
 */
export function createStatsContext(
  config: StatsConfig,
  db: DatabaseContext,
  overrides: Partial<Omit<StatsContext, 'config'>> = {}
): StatsContext {
  return {
    config,
    stores: overrides.stores ?? createSqliteStores(db),
    executor: overrides.executor ?? new SqliteQueryExecutor(db.replica),
    files: overrides.files ?? new TimeSeriesStore(miningDir(config)),
    logger: overrides.logger ?? getLogger(),
    now: overrides.now ?? (() => new Date()),
  };
}

// =============================================================================
// Job
// =============================================================================

const CHART_IMAGE = /\.(png|gif)$/i;

/**
 * Remove cached chart images so charts are redrawn from fresh data
 */
export async function tidyChartImages(dir: string | undefined, logger: Logger): Promise<number> {
  if (!dir) return 0;

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    logger.debug('Chart directory not readable, nothing to tidy', { dir, reason: errorMessage(error) });
    return 0;
  }

  let removed = 0;
  for (const entry of entries.filter(e => CHART_IMAGE.test(e))) {
    try {
      await fs.unlink(path.join(dir, entry));
      removed++;
    } catch (error) {
      logger.warn('Could not remove chart image', { file: entry, reason: errorMessage(error) });
    }
  }
  return removed;
}

/**
 * Run the daily stats job
 */
export async function runDailyStats(
  ctx: StatsContext,
  options: DailyStatsOptions
): Promise<DailyStatsResult> {
  const { config, stores, files, logger, now } = ctx;
  const startedAt = Date.now();
  const jobId = now().toISOString();

  if (options.effectiveDate !== undefined) {
    parseIsoDate(options.effectiveDate);
  }

  logger.jobStart('daily-stats', jobId, { mode: options.mode });

  const removedChartImages = await tidyChartImages(config.graphsDir, logger);
  const directoryError = await prepareDirectory(files, logger);

  const domain = await loadCategoryDomain(stores.entities, config.categoryAliases);
  const targets = await listProductTargets(stores.entities, config.allProductsLabel);

  logger.info('Category domain loaded', {
    statuses: domain.statuses.map(c => c.name),
    resolutions: domain.resolutions.map(c => c.name),
    products: targets.length,
  });

  // Without the directory no product can be written; series still run
  const runProduct: ProductRunner =
    directoryError !== null
      ? failingRunner(directoryError)
      : options.mode === 'regenerate'
        ? await regenerationRunner(ctx, domain, options.onProgress)
        : incrementalRunner(ctx, domain);

  const products: ProductOutcome[] = [];
  for (const target of targets) {
    try {
      products.push(await runProduct(target));
    } catch (error) {
      logger.error('Product processing failed', error, {
        eventName: 'product.failed',
        product: target.name,
      });
      products.push({ product: target.name, status: 'failed', error: errorMessage(error) });
    }
  }

  const scheduler = new SeriesScheduler({
    series: stores.series,
    executor: ctx.executor,
    now,
    logger,
  });
  const series = await scheduler.runDaily(options.effectiveDate);

  const durationMs = Date.now() - startedAt;
  const failed = products.filter(p => p.status === 'failed').length;
  logger.jobEnd('daily-stats', jobId, failed === 0, durationMs, {
    mode: options.mode,
    products: products.length,
    failedProducts: failed,
  });

  return {
    mode: options.mode,
    products,
    series,
    removedChartImages,
    durationMs,
    duration: formatDuration(durationMs),
  };
}

type ProductRunner = (target: ProductTarget) => Promise<ProductOutcome>;

/**
 * Create the data directory; the error message when that fails
 */
async function prepareDirectory(files: TimeSeriesStore, logger: Logger): Promise<string | null> {
  try {
    await files.ensureDirectory();
    return null;
  } catch (error) {
    logger.error('Data directory unavailable', error, {
      eventName: 'directory.failed',
      dir: files.directory,
    });
    return errorMessage(error);
  }
}

function failingRunner(message: string): ProductRunner {
  return async target => ({ product: target.name, status: 'failed', error: message });
}

async function regenerationRunner(
  ctx: StatsContext,
  domain: CategoryDomain,
  onProgress?: (progress: RegenerationProgress) => void
): Promise<ProductRunner> {
  // One bulk load of the audit trail serves every product
  const history = await loadReplayHistory(ctx.stores.entities);
  const engine = new RegenerationEngine({
    entities: ctx.stores.entities,
    files: ctx.files,
    domain,
    history,
    now: ctx.now,
    onProgress,
    logger: ctx.logger,
  });

  return async target => {
    const result = await engine.regenerate(target);
    return result.status === 'skipped'
      ? { product: target.name, status: 'skipped' }
      : { product: target.name, status: 'written', write: 'rewrite', rows: result.rows };
  };
}

function incrementalRunner(
  ctx: StatsContext,
  domain: CategoryDomain
): ProductRunner {
  const collector = new IncrementalCollector({
    entities: ctx.stores.entities,
    files: ctx.files,
    domain,
    now: ctx.now,
    logger: ctx.logger,
  });

  return async target => {
    const result = await collector.collectToday(target);
    return {
      product: target.name,
      status: 'written',
      write: result.mode,
      rows: result.mode === 'append' ? 1 : result.carriedRows + 1,
    };
  };
}
