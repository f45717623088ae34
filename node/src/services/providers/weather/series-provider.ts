// Contract every hourly-series source implements. The aggregator only sees this.
import type { SeriesTable } from '@/types/forecast';

export interface SeriesQuery {
  latitude: number;
  longitude: number;
  timezone: string;
  providerId: string;
  /** Aborts the in-flight request when another model's fetch has already failed. */
  signal?: AbortSignal;
}

export interface SeriesFetcher {
  name: string;
  fetchSeries(query: SeriesQuery): Promise<SeriesTable>;
}
