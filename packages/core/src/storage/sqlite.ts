/**
 * SQLite Storage Implementation
 *
 * Default storage backend, using better-sqlite3 for synchronous, fast
 * SQLite operations behind the async store interfaces.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { timestampToDayNumber } from '../time/days.js';
import type { DatabaseContext } from '../database/connection.js';
import type {
  AuditEvent,
  CategoryField,
  EntityCurrentState,
  EntityStore,
  FieldHistory,
  Product,
  Series,
  SeriesDataPoint,
  SeriesStore,
  StatsStores,
} from './interfaces.js';

// =============================================================================
// Row Schemas
// =============================================================================

const ValueRowSchema = z.object({ value: z.string() });
const CountRowSchema = z.object({ count: z.number().int() });

const ProductRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const EntityRowSchema = z.object({
  id: z.number().int(),
  product_id: z.number().int(),
  status: z.string(),
  resolution: z.string(),
  created_at: z.string(),
});

const AuditRowSchema = z.object({
  id: z.number().int(),
  entity_id: z.number().int(),
  added: z.string(),
  removed: z.string(),
  changed_at: z.string(),
});

const SeriesRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  query: z.string(),
  frequency: z.number().int(),
  creator_id: z.number().int(),
});

const DataPointRowSchema = z.object({
  series_id: z.number().int(),
  series_date: z.string(),
  series_value: z.number().int(),
});

/**
 * Entity column holding each categorised field
 */
const FIELD_COLUMNS: Record<CategoryField, string> = {
  status: 'status',
  resolution: 'resolution',
};

// =============================================================================
// SQLite Entity Store
// =============================================================================

export class SQLiteEntityStore implements EntityStore {
  constructor(private db: Database.Database) {}

  async listLegalValues(field: CategoryField): Promise<string[]> {
    const rows = this.db
      .prepare(
        `SELECT value FROM field_values
          WHERE field = ? AND is_active = 1
       ORDER BY sortkey, value`
      )
      .all(field);

    return z.array(ValueRowSchema).parse(rows).map(r => r.value);
  }

  async listHistoricalValues(field: CategoryField): Promise<string[]> {
    // Values on either side of a change that have no active legal value:
    // retired, deactivated or renamed categories.
    const rows = this.db
      .prepare(
        `SELECT h.value AS value
           FROM (SELECT added AS value, changed_at, id
                   FROM audit_events WHERE field = @field
                 UNION ALL
                 SELECT removed AS value, changed_at, id
                   FROM audit_events WHERE field = @field) h
      LEFT JOIN field_values fv
             ON fv.field = @field AND fv.value = h.value AND fv.is_active = 1
          WHERE fv.id IS NULL AND h.value != ''
       GROUP BY h.value
       ORDER BY MIN(h.changed_at), MIN(h.id), h.value`
      )
      .all({ field });

    return z.array(ValueRowSchema).parse(rows).map(r => r.value);
  }

  async listProducts(): Promise<Product[]> {
    const rows = this.db.prepare('SELECT id, name FROM products ORDER BY name').all();
    return z.array(ProductRowSchema).parse(rows);
  }

  async listEntities(productId: number | null): Promise<EntityCurrentState[]> {
    let sql = 'SELECT id, product_id, status, resolution, created_at FROM entities';
    const params: number[] = [];

    if (productId !== null) {
      sql += ' WHERE product_id = ?';
      params.push(productId);
    }
    sql += ' ORDER BY created_at, id';

    const rows = z.array(EntityRowSchema).parse(this.db.prepare(sql).all(...params));
    return rows.map(row => ({
      entityId: row.id,
      productId: row.product_id,
      creationDay: timestampToDayNumber(row.created_at),
      status: row.status,
      resolution: row.resolution,
    }));
  }

  async loadFieldHistory(field: CategoryField): Promise<FieldHistory> {
    const rows = z.array(AuditRowSchema).parse(
      this.db
        .prepare(
          `SELECT id, entity_id, added, removed, changed_at
             FROM audit_events
            WHERE field = ?
         ORDER BY changed_at, id`
        )
        .all(field)
    );

    const history: FieldHistory = new Map();
    for (const row of rows) {
      const event: AuditEvent = {
        entityId: row.entity_id,
        field,
        added: row.added,
        removed: row.removed,
        dayNumber: timestampToDayNumber(row.changed_at),
        sequence: row.id,
      };
      const events = history.get(row.entity_id);
      if (events) {
        events.push(event);
      } else {
        history.set(row.entity_id, [event]);
      }
    }

    return history;
  }

  async countByCategory(
    field: CategoryField,
    value: string,
    productId: number | null
  ): Promise<number> {
    let sql = `SELECT COUNT(*) AS count FROM entities WHERE ${FIELD_COLUMNS[field]} = ?`;
    const params: Array<string | number> = [value];

    if (productId !== null) {
      sql += ' AND product_id = ?';
      params.push(productId);
    }

    return CountRowSchema.parse(this.db.prepare(sql).get(...params)).count;
  }
}

// =============================================================================
// SQLite Series Store
// =============================================================================

export class SQLiteSeriesStore implements SeriesStore {
  private replace: (point: SeriesDataPoint) => void;

  constructor(private db: Database.Database) {
    const deleteStmt = this.db.prepare(
      'DELETE FROM series_data WHERE series_id = ? AND series_date = ?'
    );
    const insertStmt = this.db.prepare(
      'INSERT INTO series_data (series_id, series_date, series_value) VALUES (?, ?, ?)'
    );

    this.replace = this.db.transaction((point: SeriesDataPoint) => {
      deleteStmt.run(point.seriesId, point.date);
      insertStmt.run(point.seriesId, point.date, point.value);
    });
  }

  async listActiveSeries(): Promise<Series[]> {
    const rows = z.array(SeriesRowSchema).parse(
      this.db
        .prepare(
          `SELECT id, name, query, frequency, creator_id
             FROM series
            WHERE frequency != 0
         ORDER BY id`
        )
        .all()
    );

    return rows.map(row => ({
      id: row.id,
      name: row.name,
      query: row.query,
      frequencyDays: row.frequency,
      ownerId: row.creator_id,
    }));
  }

  async replaceDataPoint(point: SeriesDataPoint): Promise<void> {
    this.replace(point);
  }

  async listDataPoints(seriesId: number): Promise<SeriesDataPoint[]> {
    const rows = z.array(DataPointRowSchema).parse(
      this.db
        .prepare(
          `SELECT series_id, series_date, series_value
             FROM series_data
            WHERE series_id = ?
         ORDER BY series_date`
        )
        .all(seriesId)
    );

    return rows.map(row => ({
      seriesId: row.series_id,
      date: row.series_date,
      value: row.series_value,
    }));
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Bind the stores to a run's database handles: entity reads go to the
 * replica, series writes to the primary.
 */
export function createSqliteStores(context: DatabaseContext): StatsStores {
  return {
    entities: new SQLiteEntityStore(context.replica),
    series: new SQLiteSeriesStore(context.primary),
  };
}
