/**
 * Commands Index
 *
 * Registers the top-level commands:
 * - update: full reconciliation, report and index rebuild
 * - check: list available updates for declared artifacts
 * - sync: download missing declared artifacts
 * - regenerate: rebuild the index only
 */

import type { Command } from 'commander';
import type { CLIContext } from '../context.js';
import { registerCheckCommand } from './check.js';
import { registerRegenerateCommand } from './regenerate.js';
import { registerSyncCommand } from './sync.js';
import { registerUpdateCommand } from './update.js';

export function registerCommands(program: Command, getContext: () => CLIContext): void {
  registerUpdateCommand(program, getContext);
  registerCheckCommand(program, getContext);
  registerSyncCommand(program, getContext);
  registerRegenerateCommand(program, getContext);
}
