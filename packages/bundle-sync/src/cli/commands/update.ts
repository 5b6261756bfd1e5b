/**
 * Update Command
 *
 * Full run: reconcile the repository index against upstream, download the
 * declared artifacts, write the report, then rebuild the index.
 *
 * Usage:
 *   bundle-sync update [--no-report] [--no-regenerate]
 *
 * @module cli/commands/update
 */

import type { Command } from 'commander';
import { loadDesiredState } from '../../desired-state/declaration.js';
import { regenerateIndex } from '../../index-generator/index-generator.js';
import type { RegenerateResult } from '../../index-generator/index-generator.js';
import { readRepositoryIndex } from '../../index-reader/index-reader.js';
import { createSyncPipeline } from '../../reconcile/pipeline.js';
import { writeMarkdownReport } from '../../report/markdown-report.js';
import { EXIT_CODES, runCommand } from '../context.js';
import type { CLIContext, CommandDependencies, ExitCode } from '../context.js';
import { formatJson, printOutput } from '../lib/output.js';
import { formatCounts, formatFailures } from '../lib/summary.js';

export interface UpdateOptions {
  /** Write the markdown report (default: true) */
  readonly report: boolean;
  /** Rebuild the index afterwards (default: true) */
  readonly regenerate: boolean;
}

export function registerUpdateCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('update')
    .description('Update indexed bundles and declared downloads to their latest versions')
    .option('--no-report', 'Skip writing the unavailable dependencies report')
    .option('--no-regenerate', 'Skip rebuilding the repository index')
    .action(async (options: UpdateOptions) => {
      process.exitCode = await executeUpdate(getContext(), options);
    });
}

export async function executeUpdate(
  context: CLIContext,
  options: UpdateOptions,
  deps: CommandDependencies = {}
): Promise<ExitCode> {
  const print = deps.print ?? printOutput;

  return runCommand(context, 'update', async () => {
    const { sync } = context.config;
    const { logger } = context;

    const desiredState = await loadDesiredState(sync.paths.declaration, {
      defaultFolder: sync.defaultFolder,
      logger,
    });
    const index = await readRepositoryIndex(sync.paths.index);

    const { engine, rateLimiter } = createSyncPipeline(sync, { logger });
    const result = await engine.run({ index, desiredState });
    logger.info('Upstream requests', { hosts: rateLimiter.getAllStats() });

    if (options.report) {
      const generatedAt = deps.now ? deps.now() : new Date();
      await writeMarkdownReport(sync.paths.report, result, { generatedAt });
      logger.info('Report written', { path: sync.paths.report });
    }

    let regenerated: RegenerateResult | null = null;
    if (options.regenerate) {
      regenerated = await regenerateIndex(sync, deps.runner, logger);
    }

    if (context.config.json) {
      print(
        formatJson({
          indexProcessed: result.indexProcessed,
          counts: result.counts,
          writtenFiles: result.writtenFiles,
          outcomes: result.outcomes,
          regenerated,
        })
      );
    } else {
      print(formatCounts(result));
      const failures = formatFailures(result.outcomes);
      if (failures !== null) {
        print(`\nErrors:\n${failures}`);
      }
      if (regenerated !== null) {
        print(
          regenerated.ok
            ? `\nIndex regenerated: ${regenerated.resourceCount} resources from ${regenerated.jarCount} JARs`
            : `\nIndex regeneration failed: ${regenerated.error ?? 'unknown error'}`
        );
      }
    }

    const failed = result.counts.error > 0 || (regenerated !== null && !regenerated.ok);
    return failed ? EXIT_CODES.ERRORS : EXIT_CODES.SUCCESS;
  });
}
