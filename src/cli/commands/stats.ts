/**
 * Stats Command
 *
 * File counts and sizes per lake folder and per endpoint.
 *
 * @module cli/commands/stats
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatBytes } from '../formatters/progress.js';
import { formatTable } from '../formatters/table.js';
import type { LakeStatistics } from '../../lake/statistics.js';

/**
 * Options for the stats command.
 */
export interface StatsOptions {
  /** Output format */
  format?: 'table' | 'json';
}

const FOLDER_COLUMNS = [
  { header: 'FOLDER', width: 20 },
  { header: 'FILES', width: 8, alignRight: true },
  { header: 'SIZE', width: 10, alignRight: true },
];

const ENDPOINT_COLUMNS = [
  { header: 'ENDPOINT', width: 24 },
  { header: 'FILES', width: 8, alignRight: true },
  { header: 'SIZE', width: 10, alignRight: true },
  { header: 'STORES', width: 6, alignRight: true },
  { header: 'DATES', width: 23 },
];

/**
 * Register the stats command.
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show file counts and sizes')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: StatsOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleStats(options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

function dateRange(dates: readonly string[]): string {
  if (dates.length === 0) return '-';
  const first = dates[0];
  const last = dates[dates.length - 1];
  return first === last ? first : `${first}..${last}`;
}

/**
 * Handle the stats command.
 */
export async function handleStats(options: StatsOptions, base: BaseCommand): Promise<LakeStatistics> {
  const lake = await base.openLake();
  const stats = await lake.statistics();

  if (options.format === 'json') {
    base.json(stats);
    return stats;
  }

  base.section('Lake');
  base.keyValue('Root', base.dataDir);
  base.keyValue('Files', stats.totalFiles);
  base.keyValue('Size', formatBytes(stats.totalBytes));

  base.blank();
  const folderRows = Object.entries(stats.folders).map(([name, folder]) => [
    name,
    String(folder.files),
    formatBytes(folder.bytes),
  ]);
  for (const line of formatTable(FOLDER_COLUMNS, folderRows)) {
    base.info(line);
  }

  const endpointRows = Object.entries(stats.endpoints)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([endpoint, entry]) => [
      endpoint,
      String(entry.files),
      formatBytes(entry.bytes),
      String(entry.stores.length),
      dateRange(entry.dates),
    ]);

  if (endpointRows.length > 0) {
    base.section('Endpoints');
    for (const line of formatTable(ENDPOINT_COLUMNS, endpointRows)) {
      base.info(line);
    }
  }
  return stats;
}

export default registerStatsCommand;
