import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import type { InternalAxiosRequestConfig } from 'axios';
import { OpenMeteoSeriesFetcher } from '@/services/providers/weather/open-meteo-series';
import { MalformedResponseError, UpstreamError } from '@/services/errors';
import { hourlyPayload, silentLogger, stubHttp } from './helpers';
import type { StubAnswer } from './helpers';

const BASE_URL = 'https://forecast.test/v1/forecast';

function fetcherFor(answer: (config: InternalAxiosRequestConfig) => StubAnswer) {
  return new OpenMeteoSeriesFetcher({
    baseUrl: BASE_URL,
    timeoutMs: 30_000,
    logger: silentLogger(),
    http: stubHttp(answer),
  });
}

const query = { latitude: 22.26, longitude: 69.4, timezone: 'Asia/Kolkata', providerId: 'gfs_seamless' };

describe('OpenMeteoSeriesFetcher', () => {
  it('sends one GET with the hourly fields, zone and model', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const fetcher = fetcherFor((config) => {
      seen.push(config);
      return { status: 200, data: hourlyPayload('2025-08-19') };
    });

    await fetcher.fetchSeries(query);

    expect(seen).toHaveLength(1);
    expect(seen[0]?.url).toBe(BASE_URL);
    expect(seen[0]?.method).toBe('get');
    expect(seen[0]?.timeout).toBe(30_000);
    expect(seen[0]?.params).toEqual({
      latitude: 22.26,
      longitude: 69.4,
      hourly: 'temperature_2m,precipitation,wind_speed_10m',
      timezone: 'Asia/Kolkata',
      models: 'gfs_seamless',
    });
  });

  it('reads measures positionally into zone-aware observations', async () => {
    const fetcher = fetcherFor(() => ({
      status: 200,
      data: hourlyPayload('2025-08-19', {
        temperature: (h) => 20 + h,
        precipitation: (h) => (h === 3 ? null : h / 10),
        wind: (h) => h * 2,
      }),
    }));

    const series = await fetcher.fetchSeries(query);

    expect(series.providerId).toBe('gfs_seamless');
    expect(series.observations).toHaveLength(24);
    const third = series.observations[3];
    expect(third?.time.toISO()).toBe('2025-08-19T03:00:00.000+05:30');
    expect(third?.temperature).toBe(23);
    expect(third?.precipitation).toBeNull();
    expect(third?.windSpeed).toBe(6);
  });

  it('parses times in the zone the provider echoes back', async () => {
    const fetcher = fetcherFor(() => ({ status: 200, data: hourlyPayload('2025-01-01', {}, 'Europe/Berlin') }));

    const series = await fetcher.fetchSeries({ ...query, timezone: 'auto' });

    expect(series.observations[0]?.time.toUTC().toISO()).toBe('2024-12-31T23:00:00.000Z');
  });

  it('maps non-2xx answers to UpstreamError with the provider reason', async () => {
    const fetcher = fetcherFor(() => ({ status: 400, data: { error: true, reason: 'Invalid timezone' } }));

    const failure = fetcher.fetchSeries({ ...query, timezone: 'Mars/Base' });

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      status: 400,
      message: 'Open-Meteo returned 400 for gfs_seamless: Invalid timezone',
    });
  });

  it('maps timeouts to UpstreamError', async () => {
    const fetcher = fetcherFor((config) => {
      throw new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', config);
    });

    await expect(fetcher.fetchSeries(query)).rejects.toThrow('Forecast request for gfs_seamless timed out after 30000ms');
  });

  it('rejects payloads without the hourly arrays', async () => {
    const fetcher = fetcherFor(() => ({ status: 200, data: { latitude: 1, longitude: 2 } }));

    const failure = fetcher.fetchSeries(query);

    await expect(failure).rejects.toBeInstanceOf(MalformedResponseError);
    await expect(failure).rejects.toMatchObject({ code: 'MALFORMED_RESPONSE' });
  });

  it('rejects hourly arrays of different lengths', async () => {
    const payload = hourlyPayload('2025-08-19');
    payload.hourly.wind_speed_10m.pop();
    const fetcher = fetcherFor(() => ({ status: 200, data: payload }));

    await expect(fetcher.fetchSeries(query)).rejects.toThrow('hourly arrays differ in length');
  });

  it('rejects timestamps it cannot parse', async () => {
    const payload = hourlyPayload('2025-08-19');
    payload.hourly.time[5] = 'not-a-time';
    const fetcher = fetcherFor(() => ({ status: 200, data: payload }));

    await expect(fetcher.fetchSeries(query)).rejects.toThrow('Unparsable timestamp "not-a-time"');
  });
});
