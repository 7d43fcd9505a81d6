/**
 * Database Connection Manager
 *
 * Handles SQLite database connections with proper configuration, and the
 * primary / replica pair every stats component receives explicitly.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export interface DatabaseConfig {
  path: string;
  readonly?: boolean;
  fileMustExist?: boolean;
  timeout?: number;
  verbose?: boolean;
}

export class DatabaseConnection {
  private db: Database.Database | null = null;
  private config: Required<DatabaseConfig>;

  constructor(config: DatabaseConfig) {
    this.config = {
      readonly: false,
      fileMustExist: false,
      timeout: 5000,
      verbose: false,
      ...config
    };
  }

  /**
   * Get or create database connection
   */
  getConnection(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const isMemory = this.config.path === ':memory:';

    // Ensure directory exists
    if (!isMemory && !this.config.readonly) {
      const dir = path.dirname(this.config.path);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.config.path, {
      readonly: this.config.readonly,
      fileMustExist: this.config.fileMustExist,
      timeout: this.config.timeout,
      verbose: this.config.verbose ? console.log : undefined
    });

    this.configurePragmas(isMemory);

    return this.db;
  }

  /**
   * Configure SQLite pragmas
   */
  private configurePragmas(isMemory: boolean): void {
    if (!this.db) return;

    if (!this.config.readonly && !isMemory) {
      // Enable WAL mode for better concurrency
      this.db.pragma('journal_mode = WAL');
    }

    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('cache_size = 10000');
    this.db.pragma('temp_store = MEMORY');
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Check if connection is open
   */
  isOpen(): boolean {
    return this.db !== null && this.db.open;
  }
}

/**
 * Create a new database connection
 */
export function createConnection(config: DatabaseConfig): DatabaseConnection {
  return new DatabaseConnection(config);
}

/**
 * Create an in-memory database (for testing)
 */
export function createInMemoryConnection(): DatabaseConnection {
  return new DatabaseConnection({ path: ':memory:' });
}

// =============================================================================
// Primary / Replica Context
// =============================================================================

/**
 * Database handles for one job run. Replay and counting read `replica`;
 * series data points are written to `primary`. Both may be the same handle.
 */
export interface DatabaseContext {
  primary: Database.Database;
  replica: Database.Database;
}

/**
 * Open the primary and, when configured, a read-only replica.
 * Returns a closer that releases both.
 */
export function openDatabaseContext(
  primaryPath: string,
  replicaPath?: string
): { context: DatabaseContext; close: () => void } {
  const primary = createConnection({ path: primaryPath });
  const replica =
    replicaPath && replicaPath !== primaryPath
      ? createConnection({ path: replicaPath, readonly: true, fileMustExist: true })
      : null;

  const primaryDb = primary.getConnection();
  let replicaDb = primaryDb;
  if (replica) {
    try {
      replicaDb = replica.getConnection();
    } catch (error) {
      primary.close();
      throw error;
    }
  }
  const context: DatabaseContext = { primary: primaryDb, replica: replicaDb };

  return {
    context,
    close: () => {
      replica?.close();
      primary.close();
    },
  };
}
