/**
 * Database Module
 *
 * SQLite connections, the primary / replica run context and schema migrations.
 */

export {
  DatabaseConnection,
  createConnection,
  createInMemoryConnection,
  openDatabaseContext,
  type DatabaseConfig,
  type DatabaseContext,
} from './connection.js';

export {
  MigrationManager,
  runMigrations,
  DEFAULT_MIGRATIONS_DIR,
  REQUIRED_TABLES,
  type Migration,
  type MigrationResult,
} from './migrations.js';
