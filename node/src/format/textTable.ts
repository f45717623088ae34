// Monospace text and CSV renderings of an aggregated forecast table.
import * as Papa from 'papaparse';
import type { AggregatedTable } from '@/types/forecast';

const COLUMN_GAP = '  ';
const TIME_FORMAT = 'yyyy-LL-dd HH:mm';

/** `20` → `20.0`, `1.25` → `1.25`, null → `NaN`. */
export function formatValue(value: number | null): string {
  if (value === null || Number.isNaN(value)) return 'NaN';
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Aligned table with a header line; time left-aligned, measures right-aligned.
 * A table without rows renders as its header line alone.
 */
export function renderText(table: AggregatedTable): string {
  const body = table.rows.map((row) => [row.time.toFormat(TIME_FORMAT), ...row.values.map(formatValue)]);
  const widths = table.columns.map((column, i) =>
    body.reduce((max, cells) => Math.max(max, (cells[i] ?? '').length), column.length),
  );

  const line = (cells: readonly string[]) =>
    cells
      .map((cell, i) => (i === 0 ? cell.padEnd(widths[i] ?? 0) : cell.padStart(widths[i] ?? 0)))
      .join(COLUMN_GAP)
      .trimEnd();

  return [line(table.columns), ...body.map(line)].join('\n');
}

/** Markdown fenced block, as the table goes out in chat. */
export function codeBlock(text: string): string {
  return '```\n' + text + '\n```';
}

/** Same table limited to its first `count` rows. */
export function headRows(table: AggregatedTable, count: number): AggregatedTable {
  return { ...table, rows: table.rows.slice(0, count) };
}

/** CSV with ISO-8601 times (offset included); null cells are left empty. */
export function renderCsv(table: AggregatedTable): string {
  return Papa.unparse(
    {
      fields: [...table.columns],
      data: table.rows.map((row) => [
        row.time.toISO({ suppressMilliseconds: true }) ?? '',
        ...row.values.map((value) => (value === null ? '' : value)),
      ]),
    },
    { newline: '\n' },
  );
}
