/**
 * Collect Command
 *
 * Runs the daily stats job: per-product counts (incremental by default,
 * full regeneration with --regenerate) followed by the due series.
 *
 * @module @trailstats/cli/commands/collect
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ConfigurationError,
  MigrationManager,
  createLogger,
  createStatsContext,
  loadConfigFromEnv,
  openDatabaseContext,
  parseIsoDate,
  runDailyStats,
  type DailyStatsResult,
  type ProductOutcome,
} from '@trailstats/core';

/**
 * Collect command options
 */
export interface CollectOptions {
  regenerate?: boolean;
  json?: boolean;
}

/**
 * Execute the collect command
 */
export async function collectCommand(
  date: string | undefined,
  options: CollectOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<DailyStatsResult> {
  const config = loadConfigFromEnv(env);
  if (date !== undefined) {
    parseIsoDate(date);
  }

  // JSON output owns stdout
  const logger = createLogger('trailstats', {
    minSeverity: config.logLevel,
    destination: options.json ? 'stderr' : 'split',
  });
  const { context, close } = openDatabaseContext(config.databasePath, config.replicaDatabasePath);
  const spinner = ora({ isSilent: options.json });

  try {
    const schema = new MigrationManager(context.primary, undefined, logger).validate();
    if (!schema.valid) {
      throw new ConfigurationError('Database schema is incomplete; run `trailstats migrate` first', schema.errors);
    }

    const mode = options.regenerate ? 'regenerate' : 'incremental';
    spinner.start(options.regenerate ? 'Regenerating time series...' : 'Collecting daily counts...');

    const result = await runDailyStats(createStatsContext(config, context, { logger }), {
      mode,
      effectiveDate: date,
      onProgress: ({ product, percent }) => {
        spinner.text = `Regenerating ${product}: ${Math.floor(percent)}%`;
      },
    });

    spinner.succeed(`Done in ${result.duration}`);

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printSummary(result);
    }

    return result;
  } catch (error) {
    spinner.fail('Stats collection failed');
    throw error;
  } finally {
    close();
  }
}

function outcomeIcon(outcome: ProductOutcome): string {
  switch (outcome.status) {
    case 'written':
      return chalk.green('✓');
    case 'skipped':
      return chalk.dim('○');
    case 'failed':
      return chalk.red('✗');
  }
}

function printSummary(result: DailyStatsResult): void {
  console.log(chalk.bold(`\n  Products (${result.mode}):\n`));

  for (const outcome of result.products) {
    const detail =
      outcome.status === 'failed'
        ? chalk.red(outcome.error ?? 'failed')
        : outcome.status === 'skipped'
          ? chalk.dim('no entities')
          : chalk.dim(`${outcome.write}, ${outcome.rows} row(s)`);
    console.log(`    ${outcomeIcon(outcome)} ${outcome.product} ${detail}`);
  }

  const { series } = result;
  console.log(chalk.bold(`\n  Series for ${series.effectiveDate}:\n`));
  console.log(`    ${series.due} due, ${series.recorded.length} recorded, ${series.skipped.length} skipped`);
  for (const skipped of series.skipped) {
    console.log(chalk.yellow(`    ! series ${skipped.seriesId}: ${skipped.message}`));
  }

  if (result.removedChartImages > 0) {
    console.log(chalk.dim(`\n  Removed ${result.removedChartImages} cached chart image(s)`));
  }
  console.log();
}
