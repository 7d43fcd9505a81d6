/**
 * Incremental Collector
 *
 * Counts today's entities per category with aggregate queries (no replay)
 * and merges the row into the product's file. The file is only appended to
 * while its schema still matches the canonical column list; any drift turns
 * the write into a full rewrite under the new schema.
 *
 * @module @trailstats/core/collection/incremental
 */

import type { CategoryDomain } from '../categories/registry.js';
import type { ProductTarget } from '../job/targets.js';
import type { EntityStore } from '../storage/interfaces.js';
import { CATEGORY_FIELDS } from '../storage/interfaces.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { formatCompactDate, toDayNumber } from '../time/days.js';
import {
  schemasEqual,
  type ParsedTimeSeries,
  type TimeSeriesRow,
} from '../timeseries/format.js';
import type { TimeSeriesStore, WriteMode } from '../timeseries/store.js';

// =============================================================================
// Types
// =============================================================================

/**
 * How the stored schema relates to the canonical one
 */
export type SchemaComparison =
  | { state: 'absent' }
  | { state: 'identical' }
  | { state: 'drift'; added: string[]; removed: string[]; reordered: boolean };

export interface CollectionResult {
  product: string;
  mode: WriteMode;
  schema: SchemaComparison;
  /** Rows carried over from the previous file on rewrite */
  carriedRows: number;
  warnings: number;
}

export interface IncrementalCollectorDeps {
  entities: EntityStore;
  files: TimeSeriesStore;
  domain: CategoryDomain;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Compare a file's schema with the canonical columns
 */
export function compareSchema(stored: string[] | null, canonical: readonly string[]): SchemaComparison {
  if (stored === null) {
    return { state: 'drift', added: [...canonical], removed: [], reordered: false };
  }
  if (schemasEqual(stored, canonical)) {
    return { state: 'identical' };
  }

  const storedSet = new Set(stored);
  const canonicalSet = new Set(canonical);
  const added = canonical.filter(c => !storedSet.has(c));
  const removed = stored.filter(c => !canonicalSet.has(c));

  return { state: 'drift', added, removed, reordered: added.length === 0 && removed.length === 0 };
}

// =============================================================================
// IncrementalCollector
// =============================================================================

export class IncrementalCollector {
  private readonly deps: IncrementalCollectorDeps;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: IncrementalCollectorDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? getLogger();
  }

  /**
   * Add today's counts to the product's file
   */
  async collectToday(target: ProductTarget): Promise<CollectionResult> {
    const { files, domain } = this.deps;
    const log = this.logger.child({ product: target.name });
    const canonical = domain.columns();

    const existing = await files.read(target.name);
    for (const warning of existing?.warnings ?? []) {
      log.warn('Data integrity warning', { eventName: 'timeseries.integrity', ...warning });
    }

    const today = await this.countToday(target);
    const schema: SchemaComparison = existing
      ? compareSchema(existing.schema, canonical)
      : { state: 'absent' };

    if (schema.state === 'drift') {
      log.notice('Schema drift detected, rewriting file', {
        eventName: 'timeseries.drift',
        added: schema.added,
        removed: schema.removed,
        reordered: schema.reordered,
      });
    }

    const { mode, rows, carried } = this.plan(existing, schema, today);
    const createdAt = existing?.createdAt ?? this.now().toISOString();

    await files.write(
      target.name,
      { schema: canonical, rows, header: { productName: target.name, createdAt } },
      mode
    );

    log.debug('Daily counts recorded', { eventName: 'collect.written', mode, date: today.date });

    return {
      product: target.name,
      mode,
      schema,
      carriedRows: carried,
      warnings: existing?.warnings.length ?? 0,
    };
  }

  /**
   * Decide between appending today's row and rewriting the file
   */
  private plan(
    existing: ParsedTimeSeries | null,
    schema: SchemaComparison,
    today: TimeSeriesRow
  ): { mode: WriteMode; rows: TimeSeriesRow[]; carried: number } {
    if (!existing) {
      return { mode: 'rewrite', rows: [today], carried: 0 };
    }

    // A second run on the same day replaces that day's row
    const previous = existing.rows.filter(row => row.date !== today.date);
    const replacesToday = previous.length !== existing.rows.length;

    if (schema.state === 'identical' && existing.endsWithNewline && !replacesToday) {
      return { mode: 'append', rows: [today], carried: 0 };
    }

    // Old rows are re-emitted under the canonical schema; categories they
    // did not track come out blank, not zero.
    return { mode: 'rewrite', rows: [...previous, today], carried: previous.length };
  }

  /**
   * One count query per raw value of each category, in canonical order
   */
  private async countToday(target: ProductTarget): Promise<TimeSeriesRow> {
    const { entities, domain } = this.deps;
    const counts = new Map<string, number>();

    // A status and a resolution sharing a name share one count
    for (const field of CATEGORY_FIELDS) {
      for (const category of domain.categories(field)) {
        let total = counts.get(category.name) ?? 0;
        for (const raw of domain.sourceValues(field, category.name)) {
          total += await entities.countByCategory(field, raw, target.productId);
        }
        counts.set(category.name, total);
      }
    }

    return { date: formatCompactDate(toDayNumber(this.now())), counts };
  }
}
