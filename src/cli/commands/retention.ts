/**
 * Retention Command
 *
 * Moves partitions older than the retention window from `dados_brutos` to
 * `arquivo`.
 *
 * @module cli/commands/retention
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { exitCodeFor, getBaseCommand, type BaseCommand } from '../base-command.js';
import { createSpinner, formatBytes } from '../formatters/progress.js';
import { formatTable } from '../formatters/table.js';
import type { RetentionResult } from '../../lake/retention.js';
import { parseWholeNumber } from './options.js';

/**
 * Options for the retention run command.
 */
export interface RetentionOptions {
  /** Retention window in days (default: POSLAKE_RETENTION_DAYS) */
  days?: string;
  /** Report what would move without touching files */
  dryRun?: boolean;
}

const COLUMNS = [
  { header: 'ENDPOINT', width: 24 },
  { header: 'DATE', width: 10 },
  { header: 'FILES', width: 6, alignRight: true },
  { header: 'SKIPPED', width: 7, alignRight: true },
  { header: 'SIZE', width: 10, alignRight: true },
];

/**
 * Register the retention command group.
 */
export function registerRetentionCommand(program: Command): void {
  const retention = program.command('retention').description('Archive partitions past the retention window');

  retention
    .command('run')
    .description('Move aged partitions to the archive')
    .option('--days <n>', 'Retention window in days')
    .option('--dry-run', 'Show what would be archived without moving files')
    .action(async (options: RetentionOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        const { failed } = await handleRetentionRun(options, base);
        if (failed.length > 0) {
          base.error(`${failed.length} partition(s) could not be archived`, exitCodeFor(failed[0].error));
        }
      } catch (error) {
        base.fatal(error);
      }
    });
}

/**
 * Handle the retention run command.
 *
 * Days that fail are listed after the table; the caller decides the exit code.
 */
export async function handleRetentionRun(
  options: RetentionOptions,
  base: BaseCommand
): Promise<RetentionResult> {
  const retentionDays =
    options.days !== undefined ? parseWholeNumber(options.days, '--days') : base.config.retentionDays;
  const dryRun = options.dryRun === true;

  const lake = await base.openLake();
  const spinner = createSpinner(`Scanning partitions older than ${retentionDays} days...`, {
    silent: base.isQuiet(),
  }).start();

  let result: RetentionResult;
  try {
    result = await lake.runRetention({ retentionDays, dryRun });
  } catch (error) {
    spinner.fail('Retention failed');
    throw error;
  }

  const { archived, failed } = result;
  if (archived.length === 0 && failed.length === 0) {
    spinner.succeed('Nothing to archive');
    return result;
  }

  const verb = dryRun ? 'Would archive' : 'Archived';
  if (failed.length > 0) {
    spinner.warn(`${verb} ${archived.length} partition(s), ${failed.length} failed`);
  } else {
    spinner.succeed(`${verb} ${archived.length} partition(s)`);
  }

  const rows = archived.map((entry) => [
    entry.endpoint,
    entry.businessDate,
    String(entry.filesArchived),
    String(entry.filesSkipped),
    formatBytes(entry.bytes),
  ]);
  if (rows.length > 0) {
    base.blank();
    for (const line of formatTable(COLUMNS, rows)) {
      base.info(line);
    }
  }

  if (failed.length > 0) {
    base.blank();
    for (const failure of failed) {
      base.fail(`${failure.endpoint} ${failure.businessDate}: ${failure.error.message}`);
    }
  }

  if (dryRun) {
    base.blank();
    base.info(chalk.dim('Dry run: no files were moved.'));
  }
  return result;
}

export default registerRetentionCommand;
