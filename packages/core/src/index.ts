/**
 * @trailstats/core - Daily category statistics for tracked entities
 *
 * This module provides:
 * - Categories: the status / resolution domain shared by every product
 * - Time series: per-product flat files with schema drift detection
 * - Reconstruction: day-by-day replay of the audit trail
 * - Collection: incremental daily counts
 * - Series: scheduled sampling of saved queries
 * - Job: the daily batch tying them together
 */

export * from './time/days.js';
export * from './errors/index.js';
export * from './telemetry/index.js';
export * from './config/index.js';
export * from './database/index.js';
export * from './storage/index.js';

export * from './categories/registry.js';
export * from './timeseries/format.js';
export * from './timeseries/store.js';
export * from './reconstruction/snapshot.js';
export * from './reconstruction/regenerate.js';
export * from './collection/incremental.js';
export * from './series/query-executor.js';
export * from './series/scheduler.js';
export * from './job/targets.js';
export * from './job/daily-stats.js';
