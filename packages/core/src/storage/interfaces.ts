/**
 * Storage Interfaces
 *
 * Boundary contracts between the stats pipeline and the tracker database.
 * The pipeline never issues SQL itself; it talks to these stores, which keeps
 * the replay and scheduling logic backend-agnostic.
 */

// =============================================================================
// Categorised Fields
// =============================================================================

export const CATEGORY_FIELDS = ['status', 'resolution'] as const;

/**
 * Entity fields whose values are counted per day
 */
export type CategoryField = (typeof CATEGORY_FIELDS)[number];

// =============================================================================
// Entity Types
// =============================================================================

export interface Product {
  id: number;
  name: string;
}

/**
 * Current state of a tracked entity
 */
export interface EntityCurrentState {
  entityId: number;
  productId: number;
  /** Day number of the creation timestamp */
  creationDay: number;
  status: string;
  /** Empty string while unresolved */
  resolution: string;
}

/**
 * One recorded change of a categorised field
 */
export interface AuditEvent {
  entityId: number;
  field: CategoryField;
  added: string;
  removed: string;
  dayNumber: number;
  /** Insertion order, breaks ties between events on the same instant */
  sequence: number;
}

/**
 * entity id -> that entity's events for one field, ascending by time
 */
export type FieldHistory = Map<number, AuditEvent[]>;

// =============================================================================
// Series Types
// =============================================================================

/**
 * A saved query sampled on a recurring schedule
 */
export interface Series {
  id: number;
  name: string;
  /** Saved query definition, opaque to the scheduler */
  query: string;
  /** Run every N days; 0 disables the series */
  frequencyDays: number;
  ownerId: number;
}

export interface SeriesDataPoint {
  seriesId: number;
  /** YYYY-MM-DD */
  date: string;
  value: number;
}

// =============================================================================
// Store Interfaces
// =============================================================================

/**
 * Read access to entities, their audit trail and the legal category values
 */
export interface EntityStore {
  /** Active legal values of a field, in canonical (sort key, value) order */
  listLegalValues(field: CategoryField): Promise<string[]>;

  /**
   * Non-empty values that appear in the field's audit trail (added or
   * removed) but are not active legal values, in first-seen order
   */
  listHistoricalValues(field: CategoryField): Promise<string[]>;

  /** All products, by name */
  listProducts(): Promise<Product[]>;

  /** Entities of one product (or all, for null), ascending by creation */
  listEntities(productId: number | null): Promise<EntityCurrentState[]>;

  /** Bulk load the whole audit trail of one field */
  loadFieldHistory(field: CategoryField): Promise<FieldHistory>;

  /** Number of entities currently holding `value` in `field` */
  countByCategory(field: CategoryField, value: string, productId: number | null): Promise<number>;
}

/**
 * Saved series and their sampled data points
 */
export interface SeriesStore {
  /** Every series whose frequency is not 0 */
  listActiveSeries(): Promise<Series[]>;

  /**
   * Delete any point for (seriesId, date) and insert the new value,
   * atomically
   */
  replaceDataPoint(point: SeriesDataPoint): Promise<void>;

  listDataPoints(seriesId: number): Promise<SeriesDataPoint[]>;
}

/**
 * Stores for one job run, bound to the primary / replica handles
 */
export interface StatsStores {
  entities: EntityStore;
  series: SeriesStore;
}
