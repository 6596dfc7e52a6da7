/**
 * Schema Commands Index
 *
 * Registers the schema registry commands:
 * - schema list - Registered endpoints and versions
 * - schema show - Version history of one endpoint
 * - schema register - Declare a new version (renames, breaking changes)
 *
 * @module cli/commands/schema
 */

import type { Command } from 'commander';
import { registerSchemaListCommand } from './list.js';
import { registerSchemaShowCommand } from './show.js';
import { registerSchemaRegisterCommand } from './register.js';

/**
 * Register all schema commands with the parent schema command.
 *
 * @param schemaCmd - Parent 'schema' command from commander
 */
export function registerSchemaCommands(schemaCmd: Command): void {
  registerSchemaListCommand(schemaCmd);
  registerSchemaShowCommand(schemaCmd);
  registerSchemaRegisterCommand(schemaCmd);
}

export { registerSchemaListCommand, handleSchemaList } from './list.js';
export { registerSchemaShowCommand, handleSchemaShow } from './show.js';
export { registerSchemaRegisterCommand, handleSchemaRegister } from './register.js';
