#!/usr/bin/env node
/**
 * Volume Refresh CLI
 * Entry point for refreshing a database from another instance's volume
 */

import { Command, InvalidArgumentError } from 'commander';
import { logger } from '../lib/logger';
import { getConfig, loadConfig, reloadConfig } from '../config';
import { closeDatabase, initDatabase } from '../state/database';
import { runRefresh, RefreshOptions } from './commands/refresh';
import { showHistory } from './commands/history';
import { EXIT_FAILED } from './report';

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer');
  }
  return parsed;
}

const program = new Command();

program
  .name('volume-refresh')
  .description('Refresh a SQL Server database from a point-in-time copy of another database\'s array volume')
  .version('1.0.0');

program
  .command('refresh')
  .description('Offline the destination, overwrite its volume from the source, bring it back online')
  .requiredOption('-d, --database <name>', 'Database name (same on both instances)')
  .requiredOption('-s, --source <instance>', 'Source instance address')
  .requiredOption('-t, --destination <instance>', 'Destination instance address')
  .requiredOption('-a, --array <endpoint>', 'Storage array management endpoint')
  .requiredOption('-u, --array-user <user>', 'Storage array user (password from ARRAY_PASSWORD)')
  .option('--allow-untrusted-cert', 'Accept a self-signed array management certificate')
  .option('--dry-run', 'Resolve both sides and stop before changing anything')
  .option('-c, --config <path>', 'Config file to use instead of the default')
  .action(async (options: RefreshOptions) => {
    try {
      process.exitCode = await runRefresh(options);
    } catch (error) {
      logger.error('Refresh failed', { error: String(error) });
      process.exitCode = EXIT_FAILED;
    }
  });

program
  .command('history')
  .description('Show recent refresh runs')
  .option('-l, --limit <number>', 'Number of runs to show', parsePositiveInt)
  .action(async (options: { limit?: number }) => {
    try {
      await initDatabase();
      await showHistory(options.limit ?? getConfig().history.listLimit);
    } catch (error) {
      logger.error('History failed', { error: String(error) });
      process.exitCode = EXIT_FAILED;
    } finally {
      closeDatabase();
    }
  });

program
  .command('config')
  .description('Show current configuration')
  .option('-c, --config <path>', 'Config file to show instead of the default')
  .action((options: { config?: string }) => {
    const config = options.config ? loadConfig(options.config) : reloadConfig();
    console.log(JSON.stringify(config, null, 2));
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', { error: String(error) });
  process.exitCode = EXIT_FAILED;
});
