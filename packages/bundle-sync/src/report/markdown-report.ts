/**
 * Markdown Report
 *
 * Renders a ReconciliationResult as the "Unavailable Dependencies Report"
 * kept at the repository root. Index outcomes fill the main sections;
 * declared artifacts get their own section at the end.
 */

import { outcomesOfKind } from '../core/types.js';
import type { OutcomeRecord, ReconciliationResult } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';

export interface ReportOptions {
  /** Timestamp printed under the title; omitted when absent */
  readonly generatedAt?: Date;
}

/**
 * Render the report
 */
export function renderMarkdownReport(
  result: ReconciliationResult,
  options: ReportOptions = {}
): string {
  const fromIndex = result.outcomes.filter((outcome) => outcome.origin === 'index');
  const declared = result.outcomes.filter((outcome) => outcome.origin === 'declared');

  const lines: string[] = ['# Unavailable Dependencies Report', ''];
  if (options.generatedAt) {
    lines.push(`Generated ${options.generatedAt.toISOString()}`, '');
  }
  if (!result.indexProcessed) {
    lines.push('No repository index was found; only declared artifacts were processed.', '');
  }

  const unavailable = outcomesOfKind(fromIndex, 'unavailable');
  section(
    lines,
    'Unavailable on Maven Central',
    'These dependencies could not be found upstream with the mapped coordinates.',
    ['Bundle Identity', 'Group ID', 'Artifact ID', 'Local Version'],
    unavailable.map((o) => [
      o.subject,
      o.coordinate.groupId,
      o.coordinate.artifactId,
      o.localVersion,
    ])
  );

  const localOnly = outcomesOfKind(fromIndex, 'local-only');
  section(
    lines,
    'Custom/Local Artifacts',
    'These are project-specific or custom artifacts not published upstream.',
    ['Bundle Identity', 'Local Version', 'URL'],
    localOnly.map((o) => [o.subject, o.localVersion ?? '', o.location])
  );

  const notMapped = outcomesOfKind(fromIndex, 'not-mapped');
  section(
    lines,
    'Not Mapped',
    'These bundles need Maven coordinates added to the `bundles` mapping.',
    ['Bundle Identity', 'Local Version', 'URL'],
    notMapped.map((o) => [o.subject, o.localVersion, o.location])
  );

  const errors = outcomesOfKind(fromIndex, 'error');
  section(
    lines,
    'Errors',
    undefined,
    ['Bundle Identity', 'Reason'],
    errors.map((o) => [o.subject, o.reason])
  );

  const updated = outcomesOfKind(fromIndex, 'updated');
  section(
    lines,
    'Successfully Updated',
    undefined,
    ['Group ID', 'Artifact ID', 'Old Version', 'New Version'],
    updated.map((o) => [
      o.coordinate.groupId,
      o.coordinate.artifactId,
      o.previousVersion ?? '',
      o.version,
    ])
  );

  const upToDate = outcomesOfKind(fromIndex, 'up-to-date');
  section(
    lines,
    'Up to Date',
    `${upToDate.length} dependencies are already at their latest version.`,
    ['Group ID', 'Artifact ID', 'Version'],
    upToDate.map((o) => [o.coordinate.groupId, o.coordinate.artifactId, o.version]),
    true
  );

  renderDeclared(lines, declared);

  return `${lines.join('\n')}\n`;
}

/**
 * Render and write the report atomically
 */
export async function writeMarkdownReport(
  path: string,
  result: ReconciliationResult,
  options: ReportOptions = {}
): Promise<void> {
  await atomicWriteFile(path, renderMarkdownReport(result, options));
}

function renderDeclared(lines: string[], declared: readonly OutcomeRecord[]): void {
  const downloaded = outcomesOfKind(declared, 'updated');
  section(
    lines,
    'Additional Downloads',
    downloaded.length > 0 ? 'Additional bundles downloaded from the declaration.' : undefined,
    ['Group ID', 'Artifact ID', 'Version', 'Folder'],
    downloaded.map((o) => [o.coordinate.groupId, o.coordinate.artifactId, o.version, o.folder])
  );

  const present = outcomesOfKind(declared, 'local-only');
  if (present.length > 0) {
    lines.push('### Already Present', '');
    table(
      lines,
      ['Artifact', 'Version', 'Location'],
      present.map((o) => [o.subject, o.localVersion ?? '', o.location])
    );
    lines.push('');
  }

  const failed = outcomesOfKind(declared, 'error');
  if (failed.length > 0) {
    lines.push('### Additional Download Errors', '');
    table(
      lines,
      ['Group ID', 'Artifact ID', 'Reason'],
      failed.map((o) => [o.coordinate?.groupId ?? '', o.coordinate?.artifactId ?? '', o.reason])
    );
    lines.push('');
  }
}

/**
 * `## title`, an optional intro line, then a table or "None"
 */
function section(
  lines: string[],
  title: string,
  intro: string | undefined,
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  alwaysIntro = false
): void {
  lines.push(`## ${title}`, '');

  if (rows.length === 0) {
    if (alwaysIntro && intro) {
      lines.push(intro, '');
    } else {
      lines.push('None', '');
    }
    return;
  }

  if (intro) {
    lines.push(intro, '');
  }
  table(lines, headers, rows);
  lines.push('');
}

function table(
  lines: string[],
  headers: readonly string[],
  rows: readonly (readonly string[])[]
): void {
  lines.push(`| ${headers.join(' | ')} |`);
  lines.push(`|${headers.map((header) => '-'.repeat(header.length + 2)).join('|')}|`);
  for (const row of rows) {
    lines.push(`| ${row.map(escapeCell).join(' | ')} |`);
  }
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
