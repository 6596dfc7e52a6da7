/**
 * Schema List Command
 *
 * Lists every endpoint in the schema registry with its current version.
 *
 * @module cli/commands/schema/list
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../../base-command.js';
import { formatTable } from '../../formatters/table.js';
import type { EndpointSchemaSummary } from '../../../lake/registry.js';

/**
 * Options for the schema list command.
 */
export interface SchemaListOptions {
  /** Output format */
  format?: 'table' | 'json';
}

const COLUMNS = [
  { header: 'ENDPOINT', width: 28 },
  { header: 'CURRENT', width: 8 },
  { header: 'VERSIONS', width: 40 },
];

/**
 * Register the schema list command.
 */
export function registerSchemaListCommand(schemaCmd: Command): void {
  schemaCmd
    .command('list')
    .description('List registered endpoints and their schema versions')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: SchemaListOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleSchemaList(options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

/**
 * Handle the schema list command.
 */
export async function handleSchemaList(
  options: SchemaListOptions,
  base: BaseCommand
): Promise<EndpointSchemaSummary[]> {
  const lake = await base.openLake();
  const summaries = lake.listSchemas();

  if (options.format === 'json') {
    base.json(summaries);
    return summaries;
  }

  if (summaries.length === 0) {
    base.info('No schemas registered yet.');
    base.info('Schemas are registered on the first ingestion of each endpoint.');
    return summaries;
  }

  base.section('Schemas');
  const rows = summaries.map((summary) => [summary.endpoint, summary.currentVersion, summary.versions.join(', ')]);
  for (const line of formatTable(COLUMNS, rows)) {
    base.info(line);
  }
  base.blank();
  base.info(`Total: ${summaries.length} endpoint${summaries.length === 1 ? '' : 's'}`);
  return summaries;
}

export default registerSchemaListCommand;
