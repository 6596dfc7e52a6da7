/**
 * Shared option parsers for CLI commands.
 *
 * @module cli/commands/options
 */

import { UsageError } from '../base-command.js';

/**
 * Commander accumulator for repeatable options (`--meta a=1 --meta b=2`).
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Turn `key=value` entries into a map. The value may itself contain `=`.
 *
 * @param entries - Raw option values
 * @param flag - Option name used in error messages
 * @throws UsageError for an entry without a key or without `=`
 */
export function parseKeyValuePairs(entries: readonly string[], flag: string): Record<string, string> {
  const pairs: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new UsageError(`Invalid ${flag} "${entry}", expected key=value`);
    }
    const key = entry.slice(0, separator).trim();
    if (key in pairs) {
      throw new UsageError(`Duplicate ${flag} key "${key}"`);
    }
    pairs[key] = entry.slice(separator + 1).trim();
  }
  return pairs;
}

/**
 * Split a comma separated list, dropping blanks.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse a non-negative whole number option.
 *
 * @throws UsageError when the value is not a whole number
 */
export function parseWholeNumber(value: string, flag: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`${flag} must be a whole number, got "${value}"`);
  }
  return parseInt(value, 10);
}
