/**
 * Output Formatting for CLI Commands
 *
 * Command results go to stdout (tables or JSON); diagnostics go through
 * the logger to stderr-backed console methods.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as an aligned plain-text table
 */
export function formatTable<T extends object>(
  data: readonly T[],
  columns: readonly TableColumn<T>[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (row: T, column: TableColumn<T>): string => String(row[column.key] ?? '');

  const widths = columns.map(
    (column) =>
      column.width ??
      Math.max(column.header.length, ...data.map((row) => cell(row, column).length))
  );

  const headerRow = columns
    .map((column, i) => padCell(column.header, widths[i] ?? 0, column.align ?? 'left'))
    .join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns
      .map((column, i) => padCell(cell(row, column), widths[i] ?? 0, column.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width, truncating with `~`
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Write command output to stdout
 */
export function printOutput(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}
