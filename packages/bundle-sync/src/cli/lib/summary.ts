/**
 * Human-readable run summaries shared by the commands
 *
 * @module cli/lib/summary
 */

import { OUTCOME_KINDS, formatCoordinate, outcomesOfKind } from '../../core/types.js';
import type { OutcomeRecord, ReconciliationResult } from '../../core/types.js';
import { formatTable } from './output.js';

interface CountRow {
  readonly outcome: string;
  readonly count: number;
}

interface FailureRow {
  readonly subject: string;
  readonly reason: string;
}

/**
 * Outcome counts as a two-column table, every kind listed
 */
export function formatCounts(result: ReconciliationResult): string {
  const rows: CountRow[] = OUTCOME_KINDS.map((kind) => ({
    outcome: kind,
    count: result.counts[kind],
  }));
  return formatTable(rows, [
    { key: 'outcome', header: 'Outcome' },
    { key: 'count', header: 'Count', align: 'right' },
  ]);
}

/**
 * Error outcomes as a table, or null when there are none
 */
export function formatFailures(outcomes: readonly OutcomeRecord[]): string | null {
  const failures: FailureRow[] = outcomesOfKind(outcomes, 'error').map((outcome) => ({
    subject: outcome.coordinate ? formatCoordinate(outcome.coordinate) : outcome.subject,
    reason: outcome.reason,
  }));
  if (failures.length === 0) {
    return null;
  }
  return formatTable(failures, [
    { key: 'subject', header: 'Artifact' },
    { key: 'reason', header: 'Reason' },
  ]);
}

/**
 * Share of requested artifacts that ended up present, as a percentage with
 * one decimal. An empty request has no coverage.
 */
export function coveragePercent(present: number, requested: number): string {
  if (requested === 0) {
    return '0.0';
  }
  return ((present / requested) * 100).toFixed(1);
}
