/**
 * Hourly series source backed by the Open-Meteo forecast API (no API key).
 * One GET per call over the provider's default horizon; filtering happens downstream.
 */
import axios, { isAxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Observation, SeriesTable } from '@/types/forecast';
import type { AppLogger } from '@/services/logger';
import { MalformedResponseError, UpstreamError } from '@/services/errors';
import type { SeriesFetcher, SeriesQuery } from './series-provider';

export const HOURLY_FIELDS = ['temperature_2m', 'precipitation', 'wind_speed_10m'] as const;

const measureSeries = z.array(z.number().nullable());

const forecastResponseSchema = z.object({
  timezone: z.string().optional(),
  hourly: z
    .object({
      time: z.array(z.string()),
      temperature_2m: measureSeries,
      precipitation: measureSeries,
      wind_speed_10m: measureSeries,
    })
    .refine(
      (h) =>
        h.temperature_2m.length === h.time.length &&
        h.precipitation.length === h.time.length &&
        h.wind_speed_10m.length === h.time.length,
      { message: 'hourly arrays differ in length' },
    ),
});

export type OpenMeteoForecastResponse = z.infer<typeof forecastResponseSchema>;

const errorBodySchema = z.object({ reason: z.string() });

export interface OpenMeteoSeriesOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: AppLogger;
  /** Injected for tests; defaults to a fresh axios instance. */
  http?: AxiosInstance;
}

export class OpenMeteoSeriesFetcher implements SeriesFetcher {
  readonly name = 'open-meteo';
  private readonly http: AxiosInstance;
  private readonly logger: AppLogger;

  constructor(private readonly options: OpenMeteoSeriesOptions) {
    this.http = options.http ?? axios.create();
    this.logger = options.logger.getSubLogger({ name: 'open-meteo' });
  }

  async fetchSeries(query: SeriesQuery): Promise<SeriesTable> {
    const { latitude, longitude, timezone, providerId, signal } = query;
    let body: unknown;
    try {
      const res = await this.http.get<unknown>(this.options.baseUrl, {
        params: {
          latitude,
          longitude,
          hourly: HOURLY_FIELDS.join(','),
          timezone,
          models: providerId,
        },
        timeout: this.options.timeoutMs,
        signal,
      });
      body = res.data;
    } catch (error) {
      throw this.toUpstreamError(error, providerId);
    }

    const parsed = forecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`).join('; ');
      throw new MalformedResponseError(`Malformed forecast for ${providerId}: ${detail}`, { cause: parsed.error });
    }

    const observations = toObservations(parsed.data, parsed.data.timezone ?? timezone, providerId);
    this.logger.debug(`Fetched ${observations.length} hourly rows for ${providerId}`);
    return { providerId, observations };
  }

  private toUpstreamError(error: unknown, providerId: string): UpstreamError {
    if (!isAxiosError(error)) {
      return new UpstreamError(`Forecast request for ${providerId} failed: ${String(error)}`, undefined, { cause: error });
    }
    if (error.response) {
      const { status } = error.response;
      const reason = errorBodySchema.safeParse(error.response.data);
      const detail = reason.success ? reason.data.reason : error.response.statusText || error.message;
      return new UpstreamError(`Open-Meteo returned ${status} for ${providerId}: ${detail}`, status, { cause: error });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new UpstreamError(
        `Forecast request for ${providerId} timed out after ${this.options.timeoutMs}ms`,
        undefined,
        { cause: error },
      );
    }
    return new UpstreamError(`Forecast request for ${providerId} failed: ${error.message}`, undefined, { cause: error });
  }
}

/**
 * Turns the parallel hourly arrays into zone-aware observations.
 * Timestamps are local wall-clock strings in `zone`; a repeated instant keeps its first sample.
 */
export function toObservations(response: OpenMeteoForecastResponse, zone: string, providerId: string): Observation[] {
  const { hourly } = response;
  const seen = new Set<number>();
  const observations: Observation[] = [];

  hourly.time.forEach((stamp, i) => {
    const time = DateTime.fromISO(stamp, { zone });
    if (!time.isValid) {
      throw new MalformedResponseError(`Unparsable timestamp "${stamp}" in ${providerId} forecast (${zone})`);
    }
    const key = time.toMillis();
    if (seen.has(key)) return;
    seen.add(key);
    observations.push({
      time,
      temperature: hourly.temperature_2m[i] ?? null,
      precipitation: hourly.precipitation[i] ?? null,
      windSpeed: hourly.wind_speed_10m[i] ?? null,
    });
  });

  return observations.sort((a, b) => a.time.toMillis() - b.time.toMillis());
}
