/**
 * Sync Command
 *
 * Downloads declared artifacts that are not yet present in their
 * destination folder, then rebuilds the index if anything was written.
 *
 * @module cli/commands/sync
 */

import type { Command } from 'commander';
import { outcomesOfKind } from '../../core/types.js';
import { loadDesiredState } from '../../desired-state/declaration.js';
import { regenerateIndex } from '../../index-generator/index-generator.js';
import type { RegenerateResult } from '../../index-generator/index-generator.js';
import { createSyncPipeline } from '../../reconcile/pipeline.js';
import { summarize } from '../../reconcile/reconciliation-engine.js';
import { EXIT_CODES, runCommand } from '../context.js';
import type { CLIContext, CommandDependencies, ExitCode } from '../context.js';
import { formatJson, printOutput } from '../lib/output.js';
import { coveragePercent, formatFailures } from '../lib/summary.js';

export interface SyncOptions {
  readonly regenerate: boolean;
}

export function registerSyncCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('sync')
    .description('Download declared artifacts that are missing locally')
    .option('--no-regenerate', 'Skip rebuilding the repository index')
    .action(async (options: SyncOptions) => {
      process.exitCode = await executeSync(getContext(), options);
    });
}

export async function executeSync(
  context: CLIContext,
  options: SyncOptions,
  deps: CommandDependencies = {}
): Promise<ExitCode> {
  const print = deps.print ?? printOutput;

  return runCommand(context, 'sync', async () => {
    const { sync } = context.config;
    const { logger } = context;

    const desiredState = await loadDesiredState(sync.paths.declaration, {
      defaultFolder: sync.defaultFolder,
      logger,
    });
    const { engine, rateLimiter } = createSyncPipeline(sync, { logger });
    const outcomes = await engine.reconcileDeclared(desiredState.artifacts, { sync: true });
    logger.info('Upstream requests', { hosts: rateLimiter.getAllStats() });
    const result = summarize(outcomes, false);

    // Skipped entries were requested too; they just can never be present
    const requested = desiredState.artifacts.length + desiredState.skipped;
    const downloaded = outcomesOfKind(outcomes, 'updated').length;
    const present = outcomesOfKind(outcomes, 'local-only').length;
    const failed = outcomesOfKind(outcomes, 'error').length;
    const coverage = coveragePercent(downloaded + present, requested);

    let regenerated: RegenerateResult | null = null;
    if (options.regenerate && result.writtenFiles.length > 0) {
      regenerated = await regenerateIndex(sync, deps.runner, logger);
    }

    if (context.config.json) {
      print(
        formatJson({
          requested,
          downloaded,
          alreadyPresent: present,
          failed,
          coverage: Number(coverage),
          writtenFiles: result.writtenFiles,
          outcomes,
          regenerated,
        })
      );
    } else {
      print(
        [
          `Requested:       ${requested}`,
          `Downloaded:      ${downloaded}`,
          `Already present: ${present}`,
          `Failed:          ${failed}`,
          `Coverage:        ${coverage}%`,
        ].join('\n')
      );
      const failures = formatFailures(outcomes);
      if (failures !== null) {
        print(`\nErrors:\n${failures}`);
      }
      if (regenerated !== null && !regenerated.ok) {
        print(`\nIndex regeneration failed: ${regenerated.error ?? 'unknown error'}`);
      }
    }

    const ok = failed === 0 && (regenerated === null || regenerated.ok);
    return ok ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
  });
}
