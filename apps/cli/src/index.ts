#!/usr/bin/env node

/**
 * trailstats CLI
 *
 * Daily category statistics for a tracker database. Meant to run once a
 * day from cron.
 *
 * Commands:
 *   trailstats [collect] [date]     Count today per product, then sample series
 *   trailstats collect --regenerate Rebuild every product file from history
 *   trailstats migrate              Create or upgrade the database schema
 *
 * Configuration is read from STATS_* environment variables.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError } from '@trailstats/core';
import { collectCommand } from './commands/collect.js';
import { migrateCommand } from './commands/migrate.js';

const program = new Command();

program
  .name('trailstats')
  .description('Daily category statistics for tracked entities')
  .version('0.1.0');

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  if (error instanceof ConfigurationError) {
    for (const issue of error.issues) {
      console.error(chalk.dim(`  - ${issue}`));
    }
  }
  process.exit(1);
}

// =============================================================================
// Commands
// =============================================================================

program
  .command('collect [date]', { isDefault: true })
  .description('Write per-product time series and record due series (date: YYYY-MM-DD label for series points)')
  .option('--regenerate', 'Rebuild every product file from the audit trail')
  .option('--json', 'Output as JSON')
  .action(async (date: string | undefined, options: { regenerate?: boolean; json?: boolean }) => {
    try {
      await collectCommand(date, options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('migrate')
  .description('Create or upgrade the database schema')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      await migrateCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Help text
// =============================================================================

program.addHelpText('after', `
Examples:
  $ trailstats                       # Daily incremental run
  $ trailstats collect 2024-03-01    # Label series points with a past date
  $ trailstats collect --regenerate  # Rebuild all product files
  $ trailstats migrate

Environment:
  STATS_DB_PATH             Primary database (default: ./data/trailstats.db)
  STATS_REPLICA_DB_PATH     Read replica for counting and replay
  STATS_DATA_DIR            Data directory; files go to <dir>/mining (default: ./data)
  STATS_GRAPHS_DIR          Cached chart images to clear on each run
  STATS_ALL_PRODUCTS_LABEL  Name of the all-products file (default: -All-)
  STATS_CATEGORY_ALIASES    JSON rename table, e.g. {"status":{"OLD":"NEW"}}
  STATS_LOG_LEVEL           DEBUG, INFO, NOTICE, WARNING, ERROR or CRITICAL
`);

// Parse and execute
program.parse();
