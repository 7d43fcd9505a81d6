/**
 * Regeneration Engine
 *
 * Rebuilds a product's time series from scratch by replaying the audit
 * trail over every day since the product's first entity was created.
 *
 * @module @trailstats/core/reconstruction/regenerate
 */

import type { CategoryDomain } from '../categories/registry.js';
import type { ProductTarget } from '../job/targets.js';
import type {
  CategoryField,
  EntityCurrentState,
  EntityStore,
  FieldHistory,
} from '../storage/interfaces.js';
import { CATEGORY_FIELDS } from '../storage/interfaces.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { formatCompactDate, toDayNumber } from '../time/days.js';
import type { TimeSeriesRow } from '../timeseries/format.js';
import type { TimeSeriesStore } from '../timeseries/store.js';
import { SnapshotReconstructor } from './snapshot.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Audit trail of every categorised field, bulk loaded once per run
 */
export type ReplayHistory = Record<CategoryField, FieldHistory>;

export interface RegenerationProgress {
  product: string;
  /** 0 to 100 */
  percent: number;
}

export interface RegenerationResult {
  product: string;
  status: 'written' | 'skipped';
  rows: number;
  firstDay?: number;
  lastDay?: number;
}

export interface RegenerationEngineDeps {
  entities: EntityStore;
  files: TimeSeriesStore;
  domain: CategoryDomain;
  history: ReplayHistory;
  now?: () => Date;
  onProgress?: (progress: RegenerationProgress) => void;
  logger?: Logger;
}

/**
 * Load the full audit trail of every categorised field
 */
export async function loadReplayHistory(store: EntityStore): Promise<ReplayHistory> {
  return {
    status: await store.loadFieldHistory('status'),
    resolution: await store.loadFieldHistory('resolution'),
  };
}

// =============================================================================
// RegenerationEngine
// =============================================================================

export class RegenerationEngine {
  private readonly deps: RegenerationEngineDeps;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: RegenerationEngineDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? getLogger();
  }

  /**
   * Recompute and rewrite the product's file. Products without entities are
   * skipped and their file is left untouched.
   */
  async regenerate(target: ProductTarget): Promise<RegenerationResult> {
    const { entities: store, files, domain } = this.deps;
    const log = this.logger.child({ product: target.name });

    const entities = await store.listEntities(target.productId);
    if (entities.length === 0) {
      log.info('No entities, skipping regeneration', { eventName: 'regenerate.skipped' });
      return { product: target.name, status: 'skipped', rows: 0 };
    }

    const firstDay = entities.reduce((min, e) => Math.min(min, e.creationDay), Infinity);
    const lastDay = toDayNumber(this.now());
    const schema = domain.columns();
    const rows = this.replay(target.name, entities, firstDay, lastDay);

    // Rewrites keep the file's original Created stamp
    const existing = await files.read(target.name);
    const createdAt = existing?.createdAt ?? this.now().toISOString();

    await files.write(
      target.name,
      { schema, rows, header: { productName: target.name, createdAt } },
      'rewrite'
    );

    log.info('Time series regenerated', {
      eventName: 'regenerate.written',
      rows: rows.length,
      firstDay,
      lastDay,
    });

    return { product: target.name, status: 'written', rows: rows.length, firstDay, lastDay };
  }

  /**
   * One row per day from firstDay+1 to lastDay
   */
  private replay(
    product: string,
    entities: EntityCurrentState[],
    firstDay: number,
    lastDay: number
  ): TimeSeriesRow[] {
    const { domain, history, onProgress } = this.deps;
    const reconstructor = new SnapshotReconstructor(history);
    const admissionOrder = [...entities].sort((a, b) => a.creationDay - b.creationDay);
    const schema = domain.columns();
    const totalDays = lastDay - firstDay;

    const active: EntityCurrentState[] = [];
    const rows: TimeSeriesRow[] = [];
    let next = 0;

    for (let day = firstDay + 1; day <= lastDay; day++) {
      onProgress?.({ product, percent: ((day - firstDay - 1) * 100) / totalDays });

      // Admit entities created on day-2: the snapshot lags creation by one full day
      while (next < admissionOrder.length && admissionOrder[next].creationDay <= day - 2) {
        active.push(admissionOrder[next]);
        next++;
      }

      const counts = new Map<string, number>(schema.map(column => [column, 0]));
      for (const entity of active) {
        for (const field of CATEGORY_FIELDS) {
          const value = reconstructor.valueAt(entity, field, day);
          if (value === null) continue;

          const category = domain.canonicalize(field, value);
          const current = counts.get(category);
          if (current !== undefined && domain.has(field, category)) {
            counts.set(category, current + 1);
          }
        }
      }

      rows.push({ date: formatCompactDate(day), counts });
    }

    onProgress?.({ product, percent: 100 });
    return rows;
  }
}
