/**
 * Stats Job Configuration
 *
 * Zod schema for the daily stats job plus an environment loader.
 *
 * @module @trailstats/core/config
 */

import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { SEVERITIES } from '../telemetry/logger.js';

// =============================================================================
// Schema
// =============================================================================

const AliasTableSchema = z.record(z.string().min(1), z.string().min(1));

/**
 * Rename table for category values, per field.
 * `{ status: { ASSIGNED: 'IN_PROGRESS' } }` counts every ASSIGNED, current
 * or historical, as IN_PROGRESS; ASSIGNED gets no column of its own.
 */
export const CategoryAliasesSchema = z.object({
  status: AliasTableSchema.default({}),
  resolution: AliasTableSchema.default({}),
});

export type CategoryAliases = z.infer<typeof CategoryAliasesSchema>;

export const StatsConfigSchema = z.object({
  /** Primary database (writes go here) */
  databasePath: z.string().min(1).default('./data/trailstats.db'),
  /** Read replica used for replay and counting; defaults to the primary */
  replicaDatabasePath: z.string().min(1).optional(),
  /** Root data directory; time-series files live in `<dataDir>/mining` */
  dataDir: z.string().min(1).default('./data'),
  /** Directory of cached chart images, cleared at the start of each run */
  graphsDir: z.string().min(1).optional(),
  /** Product key of the pseudo-product covering every entity */
  allProductsLabel: z.string().min(1).default('-All-'),
  categoryAliases: CategoryAliasesSchema.default({}),
  logLevel: z.enum(SEVERITIES).default('INFO'),
});

export type StatsConfig = z.infer<typeof StatsConfigSchema>;
export type StatsConfigInput = z.input<typeof StatsConfigSchema>;

// =============================================================================
// Loaders
// =============================================================================

/**
 * Validate a configuration object, applying defaults
 */
export function parseConfig(input: StatsConfigInput): StatsConfig {
  const result = StatsConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError('Invalid stats configuration', issues);
  }
  return result.data;
}

/**
 * Build configuration from STATS_* environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StatsConfig {
  let categoryAliases: unknown;
  if (env.STATS_CATEGORY_ALIASES) {
    try {
      categoryAliases = JSON.parse(env.STATS_CATEGORY_ALIASES);
    } catch (error) {
      throw new ConfigurationError('STATS_CATEGORY_ALIASES is not valid JSON', [
        error instanceof Error ? error.message : String(error),
      ]);
    }
  }

  const aliases = CategoryAliasesSchema.safeParse(categoryAliases ?? {});
  if (!aliases.success) {
    throw new ConfigurationError(
      'STATS_CATEGORY_ALIASES has an invalid shape',
      aliases.error.issues.map(i => `categoryAliases.${i.path.join('.')}: ${i.message}`)
    );
  }

  const levelResult = StatsConfigSchema.shape.logLevel.safeParse(env.STATS_LOG_LEVEL);
  if (!levelResult.success) {
    throw new ConfigurationError('Invalid stats configuration', [
      `logLevel: expected one of ${SEVERITIES.join(', ')}`,
    ]);
  }

  return parseConfig({
    databasePath: env.STATS_DB_PATH,
    replicaDatabasePath: env.STATS_REPLICA_DB_PATH,
    dataDir: env.STATS_DATA_DIR,
    graphsDir: env.STATS_GRAPHS_DIR,
    allProductsLabel: env.STATS_ALL_PRODUCTS_LABEL,
    categoryAliases: aliases.data,
    logLevel: levelResult.data,
  });
}

/**
 * Directory holding the per-product time-series files
 */
export function miningDir(config: Pick<StatsConfig, 'dataDir'>): string {
  return path.join(config.dataDir, 'mining');
}
