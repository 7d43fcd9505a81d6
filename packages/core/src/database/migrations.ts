/**
 * Database Migration System
 *
 * Applies versioned schema files (`NNN_description.sql`) in order, each in
 * its own transaction, and records them in `schema_version`.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { getLogger, type Logger } from '../telemetry/logger.js';

export interface Migration {
  version: number;
  description: string;
  file: string;
  sql: string;
}

export interface MigrationResult {
  version: number;
  description: string;
  success: boolean;
  error?: string;
  duration: number;
}

/**
 * Migrations shipped with this package
 */
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../db/migrations', import.meta.url));

/**
 * Tables the stats job reads or writes
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'products',
  'field_values',
  'users',
  'user_groups',
  'entities',
  'audit_events',
  'series',
  'series_data',
] as const;

const VersionRowSchema = z.object({ version: z.number().nullable() });
const HistoryRowSchema = z.object({
  version: z.number(),
  description: z.string(),
  appliedAt: z.string(),
});

export class MigrationManager {
  private db: Database.Database;
  private migrationsDir: string;
  private logger: Logger;

  constructor(db: Database.Database, migrationsDir?: string, logger?: Logger) {
    this.db = db;
    this.migrationsDir = migrationsDir || DEFAULT_MIGRATIONS_DIR;
    this.logger = logger ?? getLogger();
  }

  /**
   * Initialize migration tracking table
   */
  private initMigrationTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now')),
        description TEXT NOT NULL
      );
    `);
  }

  /**
   * Get current schema version
   */
  getCurrentVersion(): number {
    this.initMigrationTable();

    const row = VersionRowSchema.parse(
      this.db.prepare('SELECT MAX(version) as version FROM schema_version').get()
    );

    return row.version || 0;
  }

  /**
   * Get all available migrations
   */
  getAvailableMigrations(): Migration[] {
    if (!fs.existsSync(this.migrationsDir)) {
      throw new Error(`Migrations directory not found: ${this.migrationsDir}`);
    }

    const files = fs
      .readdirSync(this.migrationsDir)
      .filter(f => f.endsWith('.sql'))
      .sort();

    const migrations: Migration[] = [];

    for (const file of files) {
      const match = file.match(/^(\d+)_(.+)\.sql$/);
      if (!match) {
        this.logger.warn('Skipping invalid migration file', { file });
        continue;
      }

      migrations.push({
        version: parseInt(match[1], 10),
        description: match[2].replace(/_/g, ' '),
        file,
        sql: fs.readFileSync(path.join(this.migrationsDir, file), 'utf-8'),
      });
    }

    return migrations;
  }

  /**
   * Get pending migrations
   */
  getPendingMigrations(): Migration[] {
    const currentVersion = this.getCurrentVersion();
    return this.getAvailableMigrations().filter(m => m.version > currentVersion);
  }

  /**
   * Apply a single migration
   */
  private applyMigration(migration: Migration): MigrationResult {
    const startTime = Date.now();

    const apply = this.db.transaction(() => {
      this.db.exec(migration.sql);
      this.db
        .prepare(
          `INSERT INTO schema_version (version, description)
           VALUES (?, ?)
           ON CONFLICT(version) DO NOTHING`
        )
        .run(migration.version, migration.description);
    });

    try {
      apply();
      return {
        version: migration.version,
        description: migration.description,
        success: true,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      return {
        version: migration.version,
        description: migration.description,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        duration: Date.now() - startTime,
      };
    }
  }

  /**
   * Apply all pending migrations, stopping at the first failure
   */
  migrate(): MigrationResult[] {
    this.initMigrationTable();

    const pending = this.getPendingMigrations();
    if (pending.length === 0) {
      this.logger.debug('Database is up to date');
      return [];
    }

    const results: MigrationResult[] = [];

    for (const migration of pending) {
      const result = this.applyMigration(migration);
      results.push(result);

      if (result.success) {
        this.logger.info('Migration applied', {
          eventName: 'migration.applied',
          version: result.version,
          description: result.description,
          durationMs: result.duration,
        });
      } else {
        this.logger.error('Migration failed', undefined, {
          eventName: 'migration.failed',
          version: result.version,
          reason: result.error,
        });
        break;
      }
    }

    return results;
  }

  /**
   * Get migration history
   */
  getHistory(): Array<{ version: number; description: string; appliedAt: string }> {
    this.initMigrationTable();

    const rows = this.db
      .prepare(
        `SELECT version, description, applied_at as appliedAt
         FROM schema_version
         ORDER BY version ASC`
      )
      .all();

    return z.array(HistoryRowSchema).parse(rows);
  }

  needsMigration(): boolean {
    return this.getPendingMigrations().length > 0;
  }

  /**
   * Check that every table the job needs exists
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const lookup = this.db.prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`);

    for (const table of REQUIRED_TABLES) {
      if (!lookup.get(table)) {
        errors.push(`Missing table: ${table}`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}

/**
 * Bring a database to the latest schema; throws if any migration fails
 */
export function runMigrations(db: Database.Database, migrationsDir?: string, logger?: Logger): MigrationResult[] {
  const manager = new MigrationManager(db, migrationsDir, logger);
  const results = manager.migrate();
  const failed = results.find(r => !r.success);

  if (failed) {
    throw new Error(`Migration ${failed.version} (${failed.description}) failed: ${failed.error}`);
  }

  return results;
}
