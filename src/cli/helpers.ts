import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

export function isJsonMode(opts: { json?: boolean }): boolean {
  return opts.json === true || !process.stdout.isTTY;
}

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function outputTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => (r[i] ?? '').length))
  );
  const sep = widths.map(w => '─'.repeat(w + 2)).join('┼');

  const fmtRow = (cells: string[]) =>
    cells.map((c, i) => ` ${(c ?? '').padEnd(widths[i])} `).join('│');

  console.log(fmtRow(headers));
  console.log(sep);
  for (const row of rows) {
    console.log(fmtRow(row));
  }
}

export function truncate(s: string | null, max: number): string {
  if (!s) return '';
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

export function formatScore(n: number): string {
  return n.toFixed(3);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function parseThreshold(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < -1 || n > 1) {
    throw new InvalidArgumentError('Expected a number between -1 and 1.');
  }
  return n;
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export interface ValidationFlags {
  config?: string;
  validityThreshold?: number;
  suggestionThreshold?: number;
  top?: number;
}

/** Options shared by every command that runs the validator. */
export function withValidationOptions(cmd: Command): Command {
  return cmd
    .argument('[data]', 'Path to the dataset JSON (default: HIERVAL_DATA_PATH or data/input.json)')
    .option('--config <path>', 'Path to hierval.yaml')
    .option('--validity-threshold <n>', 'Minimum score for a VALID relationship', parseThreshold)
    .option('--suggestion-threshold <n>', 'Minimum score for a suggested parent', parseThreshold)
    .option('--top <n>', 'Max suggestions per node', parseCount);
}
