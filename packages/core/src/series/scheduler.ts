/**
 * Series Scheduler
 *
 * Samples saved queries ("series") once per day they are due and stores one
 * data point per series per date.
 *
 * Series with the same frequency are spread over different days by their id:
 * a series is due when (daysSinceEpoch + id) mod frequency == 0, so a weekly
 * series with id 3 and one with id 4 fire on consecutive days instead of
 * loading the server together.
 *
 * @module @trailstats/core/series/scheduler
 */

import { errorMessage, isStatsError } from '../errors/index.js';
import type { Series, SeriesDataPoint, SeriesStore } from '../storage/interfaces.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { formatIsoDate, parseIsoDate, toDayNumber } from '../time/days.js';
import type { QueryExecutor } from './query-executor.js';

// =============================================================================
// Types
// =============================================================================

export interface SkippedSeries {
  seriesId: number;
  reason: 'query_compilation' | 'error';
  message: string;
}

export interface SeriesRunSummary {
  /** Date stored with the data points (YYYY-MM-DD) */
  effectiveDate: string;
  /** Day number used for selection; always "now", never the effective date */
  daysSinceEpoch: number;
  due: number;
  recorded: SeriesDataPoint[];
  skipped: SkippedSeries[];
}

export interface SeriesSchedulerDeps {
  series: SeriesStore;
  executor: QueryExecutor;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Whether a series runs on the given day
 */
export function isSeriesDue(
  series: Pick<Series, 'id' | 'frequencyDays'>,
  daysSinceEpoch: number
): boolean {
  if (series.frequencyDays === 0) return false;
  return (daysSinceEpoch + series.id) % series.frequencyDays === 0;
}

// =============================================================================
// SeriesScheduler
// =============================================================================

export class SeriesScheduler {
  private readonly deps: SeriesSchedulerDeps;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: SeriesSchedulerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? getLogger();
  }

  /**
   * Run every series due today and upsert its point for `effectiveDate`
   * (default: today). A series that fails is skipped for the day; the
   * others still run.
   */
  async runDaily(effectiveDate?: string): Promise<SeriesRunSummary> {
    const today = toDayNumber(this.now());
    const date = effectiveDate ?? formatIsoDate(today);
    parseIsoDate(date);

    const due = (await this.deps.series.listActiveSeries()).filter(s => isSeriesDue(s, today));
    const summary: SeriesRunSummary = {
      effectiveDate: date,
      daysSinceEpoch: today,
      due: due.length,
      recorded: [],
      skipped: [],
    };

    for (const series of due) {
      const skipped = await this.runSeries(series, date, summary.recorded);
      if (skipped) summary.skipped.push(skipped);
    }

    this.logger.info('Series collected', {
      eventName: 'series.collected',
      effectiveDate: date,
      due: summary.due,
      recorded: summary.recorded.length,
      skipped: summary.skipped.length,
    });

    return summary;
  }

  private async runSeries(
    series: Series,
    date: string,
    recorded: SeriesDataPoint[]
  ): Promise<SkippedSeries | null> {
    const log = this.logger.child({ seriesId: series.id, series: series.name });

    try {
      const ids = await this.deps.executor.execute(series.query, series.ownerId);
      const point: SeriesDataPoint = { seriesId: series.id, date, value: new Set(ids).size };

      await this.deps.series.replaceDataPoint(point);
      recorded.push(point);
      log.debug('Series point recorded', { value: point.value });
      return null;
    } catch (error) {
      if (isStatsError(error) && error.code === 'QUERY_COMPILATION_ERROR') {
        log.warn('Series query no longer compiles, skipping', {
          eventName: 'series.skipped',
          reason: error.message,
        });
        return { seriesId: series.id, reason: 'query_compilation', message: error.message };
      }

      log.error('Series run failed', error, { eventName: 'series.failed' });
      return { seriesId: series.id, reason: 'error', message: errorMessage(error) };
    }
  }
}
