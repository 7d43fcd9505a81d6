/**
 * Storage Module
 *
 * Store contracts and the SQLite implementation.
 */

export * from './interfaces.js';
export { SQLiteEntityStore, SQLiteSeriesStore, createSqliteStores } from './sqlite.js';
