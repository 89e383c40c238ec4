import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { currentRelationshipRows, suggestionRows } from '../validation/report.js';
import type { ValidationResult } from '../types/index.js';

export type CsvCell = string | number | null | undefined;

function formatCell(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'number'
    ? String(Number(value.toFixed(4)))
    : value;
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header row from the keys of the first row; CRLF line endings. */
export function toCsv<T extends object>(rows: readonly T[], headers?: readonly string[]): string {
  const cols = headers ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
  const lines = [cols.map(formatCell).join(',')];
  for (const row of rows) {
    const cells: CsvCell[] = cols.map(c => {
      const value: unknown = Reflect.get(row, c);
      return typeof value === 'number' || typeof value === 'string' ? value : null;
    });
    lines.push(cells.map(formatCell).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

/** YYYYMMDD_HHMMSS in local time */
export function fileStamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_`
    + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

const CURRENT_HEADERS = ['Root Key', 'Root Name', 'Current Parent', 'Score', 'Status'];
const SUGGESTION_HEADERS = ['Root Key', 'Root Name', 'Current Parent', 'Suggested Parent', 'Similarity Score', 'Improvement'];

export function exportReport(
  results: readonly ValidationResult[],
  dir: string,
  stamp: string = fileStamp(),
): { current: string; suggestions: string } {
  mkdirSync(dir, { recursive: true });
  const current = join(dir, `current-relationships-${stamp}.csv`);
  const suggestions = join(dir, `suggested-parents-${stamp}.csv`);
  writeFileSync(current, toCsv(currentRelationshipRows(results), CURRENT_HEADERS), 'utf-8');
  writeFileSync(suggestions, toCsv(suggestionRows(results), SUGGESTION_HEADERS), 'utf-8');
  return { current, suggestions };
}
