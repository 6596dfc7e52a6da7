/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - Access to the configured lake
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { loadConfig, type LakeConfig } from '../config/index.js';
import { DataLake } from '../lake/data-lake.js';
import {
  IntegrityMismatchError,
  InvalidPartitionKeyError,
  UnknownSchemaVersionError,
} from '../lake/errors.js';
import { resolveDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override the configured lake root */
  dataDir?: string;
}

/**
 * Anything shaped like a commander command: options plus a parent link.
 */
export interface CommandLike {
  opts(): Record<string, unknown>;
  parent?: CommandLike | null;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Input file, endpoint or schema version not found */
  NOT_FOUND: 3,
  /** Stored data failed its hash check */
  INTEGRITY_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Bad command-line arguments detected by a handler.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Requested item does not exist.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Map an error thrown by a handler to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof IntegrityMismatchError) {
    return EXIT_CODES.INTEGRITY_ERROR;
  }
  if (error instanceof NotFoundError || error instanceof UnknownSchemaVersionError) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (error instanceof Error && (error as NodeJS.ErrnoException).code === 'ENOENT') {
    return EXIT_CODES.NOT_FOUND;
  }
  if (error instanceof UsageError || error instanceof InvalidPartitionKeyError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access
 * consistent logging, configuration and the lake itself.
 *
 * @example
 * ```typescript
 * async function statsHandler(base: BaseCommand) {
 *   const lake = await base.openLake();
 *   base.json(await lake.statistics());
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Environment configuration */
  readonly config: LakeConfig;

  /** Resolved lake root */
  readonly dataDir: string;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  private lake: DataLake | null = null;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   * @param config - Configuration (default: loaded from the environment)
   */
  constructor(options: GlobalOptions, config: LakeConfig = loadConfig()) {
    this.options = options;
    this.config = config;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ? resolveDataDir(options.dataDir) : config.dataDir;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  /**
   * Open the lake at the resolved data directory (once per command).
   */
  async openLake(): Promise<DataLake> {
    if (!this.lake) {
      this.debug(`Opening lake at ${this.dataDir}`);
      this.lake = await DataLake.open({ root: this.dataDir });
    }
    return this.lake;
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object (stack shown in verbose mode) or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(exitCodeFor(errorOrCode));
    }
    process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Report a handler failure and exit with the matching code.
   */
  fatal(error: unknown): never {
    if (error instanceof Error) {
      return this.error(error.message, error);
    }
    return this.error(String(error));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON (always, so it can be piped).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Read the global options out of commander's untyped option map.
 */
export function toGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
  return {
    verbose: opts['verbose'] === true,
    quiet: opts['quiet'] === true,
    color: opts['color'] !== false,
    dataDir: typeof opts['dataDir'] === 'string' ? opts['dataDir'] : undefined,
  };
}

/**
 * Create a BaseCommand from global options.
 */
export function createBaseCommand(options: GlobalOptions, config?: LakeConfig): BaseCommand {
  return new BaseCommand(options, config);
}

/**
 * Find the BaseCommand stored on the program by walking up from a
 * subcommand. Falls back to a default instance (for testing).
 */
export function getBaseCommand(cmd: CommandLike): BaseCommand {
  let current: CommandLike | null | undefined = cmd;
  while (current) {
    const base = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
    current = current.parent;
  }
  return new BaseCommand({});
}
