/**
 * Tracker Test Fixture
 *
 * Tracker database on the real schema, with helpers to seed
 * products, users, entities and their audit trail. Timestamps are ISO
 * strings so tests control day boundaries exactly.
 *
 * @module @trailstats/core/testing/fixtures
 */

import Database from 'better-sqlite3';
import type { DatabaseContext } from '../database/connection.js';
import { runMigrations } from '../database/migrations.js';
import type { CategoryField } from '../storage/interfaces.js';
import { createLogger, type Logger } from '../telemetry/logger.js';

export interface EntitySeed {
  productId: number;
  status: string;
  resolution?: string;
  createdAt: string;
  componentId?: number;
  assigneeId?: number;
  securityGroup?: string;
}

export interface SeriesSeed {
  id?: number;
  name: string;
  query: string;
  frequency: number;
  ownerId: number;
}

/**
 * Logger that only reports critical failures
 */
export function quietLogger(): Logger {
  return createLogger('trailstats-test', { minSeverity: 'CRITICAL', prettyPrint: false });
}

/**
 * Clock frozen at the given instant
 */
export function fixedClock(iso: string): () => Date {
  const ms = Date.parse(iso);
  return () => new Date(ms);
}

export class TrackerFixture {
  readonly db: Database.Database;

  /**
   * @param dbPath - in-memory unless a file is given
   */
  constructor(dbPath = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('foreign_keys = ON');
    runMigrations(this.db, undefined, quietLogger());
  }

  /**
   * Primary and replica share the one handle
   */
  context(): DatabaseContext {
    return { primary: this.db, replica: this.db };
  }

  close(): void {
    this.db.close();
  }

  addProduct(name: string): number {
    return this.insert('INSERT INTO products (name) VALUES (?)', name);
  }

  addComponent(productId: number, name: string): number {
    return this.insert('INSERT INTO components (product_id, name) VALUES (?, ?)', productId, name);
  }

  addUser(login: string, options: { disabled?: boolean; groups?: string[] } = {}): number {
    const id = this.insert(
      'INSERT INTO users (login, disabled) VALUES (?, ?)',
      login,
      options.disabled ? 1 : 0
    );
    for (const group of options.groups ?? []) {
      this.db.prepare('INSERT INTO user_groups (user_id, group_name) VALUES (?, ?)').run(id, group);
    }
    return id;
  }

  addLegalValue(
    field: CategoryField,
    value: string,
    options: { sortkey?: number; active?: boolean } = {}
  ): number {
    return this.insert(
      'INSERT INTO field_values (field, value, sortkey, is_active) VALUES (?, ?, ?, ?)',
      field,
      value,
      options.sortkey ?? 0,
      options.active === false ? 0 : 1
    );
  }

  /**
   * Legal values in the given order, sort keys 10, 20, 30...
   */
  addLegalValues(field: CategoryField, values: string[]): void {
    values.forEach((value, i) => this.addLegalValue(field, value, { sortkey: (i + 1) * 10 }));
  }

  addEntity(seed: EntitySeed): number {
    return this.insert(
      `INSERT INTO entities
         (product_id, component_id, assignee_id, status, resolution, security_group, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      seed.productId,
      seed.componentId ?? null,
      seed.assigneeId ?? null,
      seed.status,
      seed.resolution ?? '',
      seed.securityGroup ?? null,
      seed.createdAt
    );
  }

  addChange(
    entityId: number,
    field: CategoryField,
    removed: string,
    added: string,
    changedAt: string
  ): number {
    return this.insert(
      'INSERT INTO audit_events (entity_id, field, removed, added, changed_at) VALUES (?, ?, ?, ?, ?)',
      entityId,
      field,
      removed,
      added,
      changedAt
    );
  }

  addSeries(seed: SeriesSeed): number {
    return this.insert(
      'INSERT INTO series (id, name, query, frequency, creator_id) VALUES (?, ?, ?, ?, ?)',
      seed.id ?? null,
      seed.name,
      seed.query,
      seed.frequency,
      seed.ownerId
    );
  }

  private insert(sql: string, ...params: Array<string | number | null>): number {
    return Number(this.db.prepare(sql).run(...params).lastInsertRowid);
  }
}
