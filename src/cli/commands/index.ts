/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - ingest: Store a payload file
 * - query: Read normalized records back
 * - schema: Inspect and declare schema versions
 * - retention: Archive aged partitions
 * - stats: File counts and sizes
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerIngestCommand } from './ingest.js';
import { registerQueryCommand } from './query.js';
import { registerSchemaCommands } from './schema/index.js';
import { registerRetentionCommand } from './retention.js';
import { registerStatsCommand } from './stats.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerIngestCommand(program);
  registerQueryCommand(program);

  const schemaCmd = program.command('schema').description('Inspect and declare endpoint schema versions');
  registerSchemaCommands(schemaCmd);

  registerRetentionCommand(program);
  registerStatsCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command help entries
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'ingest <file>', description: 'Store a JSON payload file in the lake' },
    { name: 'query <endpoint>', description: 'Print normalized records for a business date range' },
    { name: 'schema list', description: 'List registered endpoints and their schema versions' },
    { name: 'schema show <endpoint>', description: 'Show the schema history of an endpoint' },
    { name: 'schema register <endpoint>', description: 'Register a new schema version' },
    { name: 'retention run', description: 'Move aged partitions to the archive' },
    { name: 'stats', description: 'Show file counts and sizes' },
  ];
}
