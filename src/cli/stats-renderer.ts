import type { FetchFailure } from '../core/comment-pipeline.js';
import type { StatsSnapshot } from '../core/run-statistics.js';

/**
 * Renders the run counters as a two-column table.
 * No file I/O performed — all data passed as parameters.
 */
export function renderStats(stats: StatsSnapshot): string {
  const rows = Object.entries(stats).map(([name, count]) => [name, String(count)]);
  return renderTable(['Counter', 'Count'], rows);
}

/**
 * Renders the tickets and pull requests that could not be fetched.
 */
export function renderFailures(failures: FetchFailure[]): string {
  const rows = failures.map((f) => [
    `#${f.ticketId}`,
    f.repoId !== undefined && f.requestId !== undefined ? `${f.repoId}!${f.requestId}` : '—',
    f.error,
  ]);
  return `${failures.length} fetch failure(s):\n` + renderTable(['Ticket', 'Pull Request', 'Error'], rows);
}

export function renderTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIdx) =>
    Math.max(...allRows.map((row) => (row[colIdx] ?? '').length)),
  );

  const formatRow = (row: string[]) =>
    '| ' + row.map((cell, i) => cell.padEnd(colWidths[i])).join(' | ') + ' |';

  const separator = '|-' + colWidths.map((w) => '-'.repeat(w)).join('-|-') + '-|';

  const lines = [formatRow(headers), separator, ...rows.map(formatRow)];
  return lines.join('\n');
}
