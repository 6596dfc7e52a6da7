/**
 * Schema Show Command
 *
 * Prints the version history of one endpoint.
 *
 * @module cli/commands/schema/show
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, NotFoundError, type BaseCommand } from '../../base-command.js';
import type { SchemaVersionEntry } from '../../../schemas/index.js';

/**
 * Options for the schema show command.
 */
export interface SchemaShowOptions {
  /** Only this version */
  schemaVersion?: string;
  /** List every field path */
  fields?: boolean;
  /** Output format */
  format?: 'text' | 'json';
}

/**
 * Register the schema show command.
 */
export function registerSchemaShowCommand(schemaCmd: Command): void {
  schemaCmd
    .command('show <endpoint>')
    .description('Show the schema history of an endpoint')
    .option('--schema-version <version>', 'Only show one version')
    .option('--fields', 'List every field path')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (endpoint: string, options: SchemaShowOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleSchemaShow(endpoint, options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

function printEntry(base: BaseCommand, entry: Readonly<SchemaVersionEntry>, showFields: boolean): void {
  const marker = entry.breaking ? chalk.red(' [breaking]') : '';
  base.info(chalk.bold(`Version ${entry.version}`) + marker);
  base.keyValue('  Previous', entry.previousVersion ?? '-');
  base.keyValue('  Registered', entry.registeredAt);
  base.keyValue('  Fields', entry.fields.length);

  const renames = Object.entries(entry.renames);
  if (renames.length > 0) {
    base.info(chalk.dim('  Renames:'));
    for (const [from, to] of renames) {
      base.info(`    ${from} -> ${to}`);
    }
  }

  if (showFields) {
    for (const field of entry.fields) {
      base.info(`    ${field}`);
    }
  }
  base.blank();
}

/**
 * Handle the schema show command.
 *
 * @throws NotFoundError if the endpoint has no registered schema
 */
export async function handleSchemaShow(
  endpoint: string,
  options: SchemaShowOptions,
  base: BaseCommand
): Promise<Readonly<SchemaVersionEntry>[]> {
  const lake = await base.openLake();

  if (!lake.registry.hasEndpoint(endpoint)) {
    throw new NotFoundError(`No schema registered for endpoint ${endpoint}`);
  }

  const entries = options.schemaVersion
    ? [lake.registry.entry(endpoint, options.schemaVersion)]
    : [...lake.registry.history(endpoint)];

  if (options.format === 'json') {
    base.json(entries);
    return entries;
  }

  base.section(`${endpoint} (current ${lake.registry.currentVersion(endpoint)})`);
  for (const entry of entries) {
    printEntry(base, entry, options.fields === true);
  }
  return entries;
}

export default registerSchemaShowCommand;
