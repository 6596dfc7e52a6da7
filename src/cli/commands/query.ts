/**
 * Query Command
 *
 * Prints the records of an endpoint for a business date range as JSON,
 * with every payload normalized to the endpoint's current field names.
 *
 * @module cli/commands/query
 */

import { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import type { QueriedRecord } from '../../lake/query.js';

/**
 * Options for the query command.
 */
export interface QueryOptions {
  from: string;
  to?: string;
  store?: string;
  /** commander inverts --no-verify to verify: false */
  verify: boolean;
  /** Print payloads only, without metadata */
  dataOnly?: boolean;
}

/**
 * Register the query command.
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query <endpoint>')
    .description('Print normalized records for a business date range as JSON')
    .requiredOption('-f, --from <YYYY-MM-DD>', 'First business date')
    .option('-t, --to <YYYY-MM-DD>', 'Last business date (default: --from)')
    .option('-s, --store <id>', 'Only this store')
    .option('--no-verify', 'Skip the payload hash check')
    .option('--data-only', 'Print payloads without metadata')
    .action(async (endpoint: string, options: QueryOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleQuery(endpoint, options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

/**
 * Handle the query command.
 */
export async function handleQuery(
  endpoint: string,
  options: QueryOptions,
  base: BaseCommand
): Promise<QueriedRecord[]> {
  const lake = await base.openLake();

  const records = await lake.query({
    endpoint,
    from: options.from,
    to: options.to,
    storeId: options.store,
    verifyIntegrity: options.verify,
  });

  base.debug(`Found ${records.length} ${endpoint} record(s)`);
  base.json(options.dataOnly ? records.map((record) => record.dados) : records);
  return records;
}

export default registerQueryCommand;
