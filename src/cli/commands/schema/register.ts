/**
 * Schema Register Command
 *
 * Declares a new schema version by hand. This is the only way to record a
 * rename: the writer registers undeclared changes as plain additions and
 * removals.
 *
 * @module cli/commands/schema/register
 */

import { Command } from 'commander';
import { getBaseCommand, UsageError, type BaseCommand } from '../../base-command.js';
import { collect, parseKeyValuePairs, parseList } from '../options.js';

/**
 * Options for the schema register command.
 */
export interface SchemaRegisterOptions {
  /** Comma separated field paths of the new version */
  fields: string;
  /** Renames as old=new */
  rename: string[];
  /** Older payloads can no longer be mapped */
  breaking?: boolean;
}

/**
 * Register the schema register command.
 */
export function registerSchemaRegisterCommand(schemaCmd: Command): void {
  schemaCmd
    .command('register <endpoint>')
    .description('Register a new schema version for an endpoint')
    .requiredOption('--fields <paths>', 'Comma separated field paths (e.g. guestCheckId,taxation[].taxNum)')
    .option('-r, --rename <old=new>', 'Field renamed since the current version (repeatable)', collect, [])
    .option('--breaking', 'Bump the major version; older payloads become unmappable')
    .action(async (endpoint: string, options: SchemaRegisterOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleSchemaRegister(endpoint, options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}

/**
 * Handle the schema register command.
 *
 * @returns The registered version
 */
export async function handleSchemaRegister(
  endpoint: string,
  options: SchemaRegisterOptions,
  base: BaseCommand
): Promise<string> {
  const fields = parseList(options.fields);
  if (fields.length === 0) {
    throw new UsageError('--fields needs at least one field path');
  }
  const renames = parseKeyValuePairs(options.rename, '--rename');

  const lake = await base.openLake();
  const previous = lake.registry.hasEndpoint(endpoint) ? lake.registry.currentVersion(endpoint) : null;

  const version = await lake.registerSchemaVersion(endpoint, fields, {
    renames,
    breaking: options.breaking === true,
  });

  if (version === previous) {
    base.info(`${endpoint} schema ${version} already has these fields; nothing registered`);
    return version;
  }

  base.success(
    previous
      ? `Registered ${endpoint} schema ${version} (was ${previous})`
      : `Registered ${endpoint} schema ${version}`
  );
  for (const [from, to] of Object.entries(renames)) {
    base.info(`  ${from} -> ${to}`);
  }
  return version;
}

export default registerSchemaRegisterCommand;
