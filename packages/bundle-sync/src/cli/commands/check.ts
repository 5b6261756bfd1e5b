/**
 * Check Command
 *
 * Compares every declared artifact with the latest upstream version
 * without downloading anything.
 *
 * @module cli/commands/check
 */

import type { Command } from 'commander';
import { formatCoordinate } from '../../core/types.js';
import type { UpdateCheck } from '../../core/types.js';
import { loadDesiredState } from '../../desired-state/declaration.js';
import { createSyncPipeline } from '../../reconcile/pipeline.js';
import { EXIT_CODES, runCommand } from '../context.js';
import type { CLIContext, CommandDependencies, ExitCode } from '../context.js';
import { formatJson, formatTable, printOutput } from '../lib/output.js';

interface UpdateRow {
  readonly groupId: string;
  readonly artifactId: string;
  readonly current: string;
  readonly latest: string;
  readonly folder: string;
}

export function registerCheckCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('check')
    .description('List declared artifacts that have a newer upstream version')
    .action(async () => {
      process.exitCode = await executeCheck(getContext());
    });
}

export async function executeCheck(
  context: CLIContext,
  deps: CommandDependencies = {}
): Promise<ExitCode> {
  const print = deps.print ?? printOutput;

  return runCommand(context, 'check', async () => {
    const { sync } = context.config;
    const { logger } = context;

    const desiredState = await loadDesiredState(sync.paths.declaration, {
      defaultFolder: sync.defaultFolder,
      logger,
    });
    const { engine, rateLimiter } = createSyncPipeline(sync, { logger });
    const checks = await engine.checkDeclared(desiredState.artifacts);
    logger.info('Upstream requests', { hosts: rateLimiter.getAllStats() });

    const notFound = checks.filter((check) => check.status === 'not-found');
    for (const check of notFound) {
      logger.warn('No upstream version found', {
        artifact: formatCoordinate(check.coordinate),
        reason: check.reason,
      });
    }

    if (context.config.json) {
      print(formatJson(checks));
    } else {
      print(formatUpdates(checks));
      const available = checks.filter((check) => check.status === 'update-available').length;
      const current = checks.filter((check) => check.status === 'current').length;
      print(`\n${available} updates available, ${current} current, ${notFound.length} not found`);
    }

    return notFound.length > 0 ? EXIT_CODES.ERRORS : EXIT_CODES.SUCCESS;
  });
}

/**
 * Table of available updates, sorted by coordinate
 */
export function formatUpdates(checks: readonly UpdateCheck[]): string {
  const rows: UpdateRow[] = [];
  for (const check of checks) {
    if (check.status === 'update-available') {
      rows.push({
        groupId: check.coordinate.groupId,
        artifactId: check.coordinate.artifactId,
        current: check.currentVersion,
        latest: check.latestVersion,
        folder: check.folder,
      });
    }
  }
  rows.sort((a, b) =>
    a.groupId === b.groupId
      ? a.artifactId.localeCompare(b.artifactId)
      : a.groupId.localeCompare(b.groupId)
  );

  return formatTable(rows, [
    { key: 'groupId', header: 'Group ID' },
    { key: 'artifactId', header: 'Artifact ID' },
    { key: 'current', header: 'Current' },
    { key: 'latest', header: 'Latest' },
    { key: 'folder', header: 'Folder' },
  ]);
}
