import chalk from 'chalk';
import Table from 'cli-table3';
import type { NormalizedTable } from '../types.js';
import { displayedTotal } from '../aggregation/normalize.js';

/**
 * Formats the counted table for the terminal (used by --summary).
 * Returned rather than printed so the CLI can send it to stderr while the
 * SVG goes to stdout.
 */
export function formatSummary(title: string, normalized: NormalizedTable): string {
  const { keys, counts, othersKey } = normalized;
  const total = displayedTotal(normalized);
  const max = keys.reduce((m, key) => Math.max(m, counts.get(key) ?? 0), 0);

  const table = new Table({
    head: [chalk.bold.gray('KEY'), chalk.bold.gray('COUNT'), chalk.bold.gray('SHARE'), ''],
    colAligns: ['left', 'right', 'right', 'left'],
    style: { head: [], border: ['gray'] },
    chars: {
      top: '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
      bottom: '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
      left: '│', 'left-mid': '├', mid: '─', 'mid-mid': '┼',
      right: '│', 'right-mid': '┤', middle: '│',
    },
  });

  for (const key of keys) {
    const count = counts.get(key) ?? 0;
    table.push([
      key === othersKey ? chalk.gray(key) : chalk.cyan(key),
      String(count),
      chalk.gray(formatShare(count, total)),
      makeBar(count, max),
    ]);
  }

  return [
    chalk.bold(title) + chalk.gray(` (${keys.length} entries, ${total} total)`),
    table.toString(),
  ].join('\n');
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function formatShare(count: number, total: number): string {
  if (total === 0) return '0.0%';
  return `${((count / total) * 100).toFixed(1)}%`;
}

function makeBar(count: number, max: number, width = 20): string {
  if (max === 0 || count === 0) return '';
  return chalk.blue('█'.repeat(Math.max(1, Math.round((count / max) * width))));
}
