#!/usr/bin/env node
/**
 * POS Data Lake CLI
 *
 * Main entry point for the poslake CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   poslake --help
 *   poslake ingest checks.json -e getGuestChecks -d 2024-01-15 -s loja001
 *   poslake query getGuestChecks --from 2024-01-01 --to 2024-01-31
 *   poslake retention run --dry-run
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, toGlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('poslake')
    .description('POS Data Lake - partitioned storage for POS API payloads with schema tracking')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override the lake root (POSLAKE_DATA_DIR)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = toGlobalOptions(thisCommand.opts());
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags');
    }
  });

  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync([...argv]);
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
