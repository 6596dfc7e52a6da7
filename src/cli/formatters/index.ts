/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  formatBytes,
  type SpinnerOptions,
} from './progress.js';

// Tables
export { formatTable, padLeft, padRight, truncate, visibleLength, type TableColumn } from './table.js';
