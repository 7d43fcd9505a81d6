/**
 * Migrate Command
 *
 * Brings the primary database to the latest schema.
 *
 * @module @trailstats/cli/commands/migrate
 */

import chalk from 'chalk';
import {
  MigrationManager,
  createConnection,
  createLogger,
  loadConfigFromEnv,
  type MigrationResult,
} from '@trailstats/core';

export interface MigrateOptions {
  json?: boolean;
}

/**
 * Execute the migrate command
 */
export async function migrateCommand(
  options: MigrateOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<MigrationResult[]> {
  const config = loadConfigFromEnv(env);
  // JSON output owns stdout
  const logger = createLogger('trailstats', {
    minSeverity: config.logLevel,
    destination: options.json ? 'stderr' : 'split',
  });
  const connection = createConnection({ path: config.databasePath });

  try {
    const manager = new MigrationManager(connection.getConnection(), undefined, logger);
    const results = manager.migrate();
    const failed = results.find(r => !r.success);

    if (options.json) {
      console.log(JSON.stringify({ version: manager.getCurrentVersion(), applied: results }, null, 2));
    } else if (results.length === 0) {
      console.log(chalk.green('\n  Database is up to date.\n'));
    } else {
      console.log(chalk.bold('\n  Migrations:\n'));
      for (const result of results) {
        const icon = result.success ? chalk.green('✓') : chalk.red('✗');
        console.log(`    ${icon} ${String(result.version).padStart(3, '0')} ${result.description}`);
      }
      console.log();
    }

    if (failed) {
      throw new Error(`Migration ${failed.version} failed: ${failed.error}`);
    }
    return results;
  } finally {
    connection.close();
  }
}
