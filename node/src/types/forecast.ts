// src/types/forecast.ts
import type { DateTime } from 'luxon';

/** User-facing short model name, e.g. "GFS". */
export type ModelKey = string;

export type Measure = 'temperature' | 'precipitation' | 'wind_speed';

export const MEASURES: readonly Measure[] = ['temperature', 'precipitation', 'wind_speed'];

/** One hourly sample for a single model. Measures are null where the provider has a gap. */
export interface Observation {
  time: DateTime;
  temperature: number | null;
  precipitation: number | null;
  windSpeed: number | null;
}

/** Hourly series of one model, ascending and unique by instant. */
export interface SeriesTable {
  providerId: string;
  observations: Observation[];
}

export interface AggregatedRow {
  time: DateTime;
  /** Aligned with `columns.slice(1)`. */
  values: Array<number | null>;
}

/**
 * Outer join of per-model series on time.
 * `columns[0]` is always "time", followed by three measure columns per model.
 */
export interface AggregatedTable {
  models: readonly ModelKey[];
  columns: readonly string[];
  rows: AggregatedRow[];
}

export interface ForecastWindow {
  /** Calendar date, YYYY-MM-DD, in the requested timezone. */
  date: string;
  startHour: number;
  endHour: number;
}

export interface ForecastRequest extends ForecastWindow {
  latitude: number;
  longitude: number;
  /** IANA zone name, e.g. "Asia/Kolkata". */
  timezone: string;
  models: readonly ModelKey[];
}
