/**
 * Commander program for the bundle-sync CLI
 *
 * @module cli/program
 */

import { Command, InvalidArgumentError } from 'commander';
import { errorMessage } from '../core/errors.js';
import { registerCommands } from './commands/index.js';
import { EXIT_CODES, GlobalOptionsSchema, initializeContext } from './context.js';
import type { CLIContext } from './context.js';

/**
 * Commander option parser for positive integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function createProgram(version: string): Command {
  let context: CLIContext | null = null;
  const getContext = (): CLIContext => {
    if (!context) {
      throw new Error('CLI context not initialized');
    }
    return context;
  };

  const program = new Command();

  program
    .name('bundle-sync')
    .description('Keep an OSGi bundle repository in step with Maven Central and its fallbacks')
    .version(version, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .bundle-syncrc)')
    .option('--root <dir>', 'Repository root (default: config file directory)')
    .option('--timeout <ms>', 'Metadata request timeout in milliseconds', parseInteger)
    .option('--concurrency <n>', 'Artifacts reconciled in parallel', parseInteger)
    .hook('preAction', (thisCommand) => {
      try {
        context = initializeContext(GlobalOptionsSchema.parse(thisCommand.opts()));
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program, getContext);

  return program;
}
