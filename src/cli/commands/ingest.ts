/**
 * Ingest Command
 *
 * Stores a JSON payload file in the lake. With `--batch` the file must hold
 * an array and each element becomes its own record.
 *
 * @module cli/commands/ingest
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import { getBaseCommand, EXIT_CODES, UsageError, type BaseCommand } from '../base-command.js';
import { JsonValueSchema, type JsonValue } from '../../schemas/index.js';
import type { FailedWrite } from '../../lake/batch.js';
import type { WriteRequest, WriteResult } from '../../lake/writer.js';
import { collect, parseKeyValuePairs } from './options.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the ingest command.
 */
export interface IngestOptions {
  endpoint: string;
  date: string;
  store: string;
  /** `origem` metadata (default: POSLAKE_SOURCE_SYSTEM) */
  source?: string;
  /** `usuario` metadata (default: POSLAKE_OPERATOR_ID) */
  operator?: string;
  /** Treat a JSON array as one payload per element */
  batch?: boolean;
  /** Extra metadata as key=value */
  meta: string[];
}

/**
 * What an ingest run produced.
 */
export interface IngestSummary {
  written: WriteResult[];
  failed: FailedWrite[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Read and parse the payload file.
 *
 * @throws UsageError when the file is not JSON
 */
async function readPayloadFile(file: string): Promise<JsonValue> {
  const content = await fs.readFile(file, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`${file} is not valid JSON: ${message}`);
  }
  return JsonValueSchema.parse(raw);
}

function reportWrite(base: BaseCommand, result: WriteResult): void {
  const { metadata, change, versionCreated } = result;
  base.success(`Wrote ${result.fileId} (schema ${metadata.versao_esquema}, ${metadata.tamanho_bytes} bytes)`);

  if (change && versionCreated) {
    base.info(chalk.yellow(`  Schema change: ${change.endpoint} ${change.baseVersion} -> ${versionCreated}`));
    if (change.fieldsAdded.length > 0) {
      base.info(`    added:   ${change.fieldsAdded.join(', ')}`);
    }
    if (change.fieldsRemoved.length > 0) {
      base.info(`    removed: ${change.fieldsRemoved.join(', ')}`);
    }
  } else if (versionCreated) {
    base.info(chalk.dim(`  Registered ${metadata.endpoint} schema ${versionCreated}`));
  }
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the ingest command.
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest <file>')
    .description('Store a JSON payload file in the lake')
    .requiredOption('-e, --endpoint <name>', 'Source API endpoint (e.g. getGuestChecks)')
    .requiredOption('-d, --date <YYYY-MM-DD>', 'Business date of the payload')
    .requiredOption('-s, --store <id>', 'Store identifier')
    .option('--source <system>', 'Source system recorded as origem')
    .option('--operator <id>', 'Operator recorded as usuario')
    .option('-b, --batch', 'Write each element of a JSON array as its own record')
    .option('-m, --meta <key=value>', 'Extra metadata (repeatable)', collect, [])
    .action(async (file: string, options: IngestOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        const summary = await handleIngest(file, options, base);
        if (summary.failed.length > 0) {
          const total = summary.failed.length + summary.written.length;
          base.error(`${summary.failed.length} of ${total} record(s) failed`, EXIT_CODES.ERROR);
        }
      } catch (error) {
        base.fatal(error);
      }
    });
}

/**
 * Handle the ingest command.
 *
 * Both modes retry transient write failures up to `writeAttempts` times.
 * A single payload that still fails throws; batch failures are reported in
 * the summary instead.
 */
export async function handleIngest(
  file: string,
  options: IngestOptions,
  base: BaseCommand
): Promise<IngestSummary> {
  const extraMetadata = parseKeyValuePairs(options.meta, '--meta');
  const payload = await readPayloadFile(file);

  const template: Omit<WriteRequest, 'payload'> = {
    endpoint: options.endpoint,
    businessDate: options.date,
    storeId: options.store,
    sourceSystem: options.source ?? base.config.sourceSystem,
    operatorId: options.operator ?? base.config.operatorId,
    extraMetadata,
  };

  const lake = await base.openLake();

  if (!options.batch) {
    base.debug(`Ingesting ${file} as one ${options.endpoint} record`);
    const { written, failed } = await lake.writeBatch([{ ...template, payload }], {
      maxAttempts: base.config.writeAttempts,
    });
    const [failure] = failed;
    if (failure) {
      throw failure.error;
    }
    reportWrite(base, written[0]);
    return { written, failed: [] };
  }

  if (!Array.isArray(payload)) {
    throw new UsageError(`--batch needs a JSON array in ${file}`);
  }

  base.debug(`Ingesting ${payload.length} ${options.endpoint} record(s) from ${file}`);
  const result = await lake.writeBatch(
    payload.map((item) => ({ ...template, payload: item })),
    { maxAttempts: base.config.writeAttempts }
  );

  for (const written of result.written) {
    reportWrite(base, written);
  }
  for (const failure of result.failed) {
    base.fail(`Record ${failure.index}: ${failure.error.message}`);
  }

  base.blank();
  base.info(`Written: ${result.written.length}, failed: ${result.failed.length}`);
  return result;
}

export default registerIngestCommand;
