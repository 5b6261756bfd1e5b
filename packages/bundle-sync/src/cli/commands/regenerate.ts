/**
 * Regenerate Command
 *
 * @module cli/commands/regenerate
 */

import type { Command } from 'commander';
import { regenerateIndex } from '../../index-generator/index-generator.js';
import { EXIT_CODES, runCommand } from '../context.js';
import type { CLIContext, CommandDependencies, ExitCode } from '../context.js';
import { formatJson, printOutput } from '../lib/output.js';

export function registerRegenerateCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('regenerate')
    .description('Rebuild index.xml and its .gz and .sha companions from the local JARs')
    .action(async () => {
      process.exitCode = await executeRegenerate(getContext());
    });
}

export async function executeRegenerate(
  context: CLIContext,
  deps: CommandDependencies = {}
): Promise<ExitCode> {
  const print = deps.print ?? printOutput;

  return runCommand(context, 'regenerate', async () => {
    const result = await regenerateIndex(context.config.sync, deps.runner, context.logger);

    if (context.config.json) {
      print(formatJson(result));
    } else if (result.ok) {
      print(`Index regenerated: ${result.resourceCount} resources from ${result.jarCount} JARs`);
    } else {
      print(`Index regeneration failed: ${result.error ?? 'unknown error'}`);
    }

    return result.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
  });
}
