// Table shaping for the aggregator: window filter, per-model columns, outer join on time.
import type { DateTime } from 'luxon';
import { MEASURES } from '@/types/forecast';
import type {
  AggregatedRow,
  AggregatedTable,
  ForecastWindow,
  ModelKey,
  Observation,
} from '@/types/forecast';

export const TIME_COLUMN = 'time';

export function columnName(measure: (typeof MEASURES)[number], model: ModelKey): string {
  return `${measure}_${model}`;
}

export function modelColumns(model: ModelKey): string[] {
  return MEASURES.map((measure) => columnName(measure, model));
}

/** Keeps observations whose local date is `window.date` and local hour is within the inclusive range. */
export function filterWindow(observations: readonly Observation[], window: ForecastWindow): Observation[] {
  return observations.filter(
    (o) => o.time.toISODate() === window.date && o.time.hour >= window.startHour && o.time.hour <= window.endHour,
  );
}

/** Single-model table with its measures namespaced by model name. */
export function toModelTable(model: ModelKey, observations: readonly Observation[]): AggregatedTable {
  return {
    models: [model],
    columns: [TIME_COLUMN, ...modelColumns(model)],
    rows: observations.map((o) => ({
      time: o.time,
      values: [o.temperature, o.precipitation, o.windSpeed],
    })),
  };
}

export function emptyTable(): AggregatedTable {
  return { models: [], columns: [TIME_COLUMN], rows: [] };
}

/**
 * Full outer join keyed on the instant. Left columns come first; a side missing
 * a timestamp contributes nulls. Result rows are ascending by time.
 */
export function outerJoin(left: AggregatedTable, right: AggregatedTable): AggregatedTable {
  const leftWidth = left.columns.length - 1;
  const rightWidth = right.columns.length - 1;
  const merged = new Map<number, { time: DateTime; left?: Array<number | null>; right?: Array<number | null> }>();

  for (const row of left.rows) {
    merged.set(row.time.toMillis(), { time: row.time, left: row.values });
  }
  for (const row of right.rows) {
    const key = row.time.toMillis();
    const existing = merged.get(key);
    if (existing) {
      existing.right = row.values;
    } else {
      merged.set(key, { time: row.time, right: row.values });
    }
  }

  const rows: AggregatedRow[] = [...merged.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, entry]) => ({
      time: entry.time,
      values: [
        ...(entry.left ?? new Array<number | null>(leftWidth).fill(null)),
        ...(entry.right ?? new Array<number | null>(rightWidth).fill(null)),
      ],
    }));

  return {
    models: [...left.models, ...right.models],
    columns: [...left.columns, ...right.columns.slice(1)],
    rows,
  };
}

/** Values of one named column, in row order. */
export function columnValues(table: AggregatedTable, column: string): Array<number | null> {
  const index = table.columns.indexOf(column);
  if (index < 1) throw new Error(`No measure column "${column}"`);
  return table.rows.map((row) => row.values[index - 1] ?? null);
}
