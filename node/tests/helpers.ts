// Shared fixtures: silent logger, in-process axios stub, hourly payload builders.
import type { Server } from 'http';
import axios, { AxiosError } from 'axios';
import express from 'express';
import type { Express } from 'express';
import type { Update } from 'grammy/types';
import type { AxiosAdapter, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DateTime } from 'luxon';
import { vi } from 'vitest';
import { createLogger } from '@/services/logger';
import type { AppLogger } from '@/services/logger';
import type { Observation, SeriesTable } from '@/types/forecast';
import type { SeriesFetcher, SeriesQuery } from '@/services/providers/weather/series-provider';
import type { ChatReply } from '@/bot/types';

export function silentLogger(): AppLogger {
  return createLogger({ name: 'test', type: 'hidden' });
}

export type StubAnswer = { status: number; data: unknown };

/** axios instance whose adapter answers in-process; non-2xx answers reject like axios does. */
export function stubHttp(answer: (config: InternalAxiosRequestConfig) => StubAnswer): AxiosInstance {
  const adapter: AxiosAdapter = async (config) => {
    const { status, data } = answer(config);
    const response: AxiosResponse = { data, status, statusText: status === 200 ? 'OK' : 'Error', headers: {}, config };
    if (status >= 200 && status < 300) return response;
    throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
  };
  return axios.create({ adapter });
}

export interface HourlyValues {
  temperature?: (hour: number) => number | null;
  precipitation?: (hour: number) => number | null;
  wind?: (hour: number) => number | null;
}

/** Open-Meteo style body with 24 local hours of `date`. */
export function hourlyPayload(date: string, values: HourlyValues = {}, timezone = 'Asia/Kolkata') {
  const hours = Array.from({ length: 24 }, (_, h) => h);
  return {
    latitude: 22.25,
    longitude: 69.375,
    timezone,
    hourly: {
      time: hours.map((h) => `${date}T${String(h).padStart(2, '0')}:00`),
      temperature_2m: hours.map(values.temperature ?? (() => 20.0)),
      precipitation: hours.map(values.precipitation ?? (() => 0)),
      wind_speed_10m: hours.map(values.wind ?? (() => 10)),
    },
  };
}

/** Observations at the given local wall-clock stamps, measures derived from the index. */
export function observationsAt(
  stamps: string[],
  zone = 'UTC',
  value: (i: number) => number | null = (i) => i,
): Observation[] {
  return stamps.map((stamp, i) => ({
    time: DateTime.fromISO(stamp, { zone }),
    temperature: value(i),
    precipitation: value(i) === null ? null : 0.1 * i,
    windSpeed: value(i) === null ? null : 5 + i,
  }));
}

/** Fetcher that serves canned series keyed by provider id. */
export function stubFetcher(byProvider: Record<string, Observation[]>) {
  const fetchSeries = vi.fn(async (query: SeriesQuery): Promise<SeriesTable> => {
    const observations = byProvider[query.providerId];
    if (!observations) throw new Error(`no stub for ${query.providerId}`);
    return { providerId: query.providerId, observations };
  });
  const fetcher: SeriesFetcher = { name: 'stub', fetchSeries };
  return { fetcher, fetchSeries };
}

/** ChatReply that records everything sent. */
export function recordingReply() {
  const reply = {
    text: vi.fn(async (_message: string, _options?: { markdown?: boolean }) => {}),
    document: vi.fn(async (_content: Buffer, _filename: string, _caption?: string) => {}),
    photo: vi.fn(async (_content: Buffer, _filename: string) => {}),
  } satisfies ChatReply;
  return reply;
}

/** Binds `app` to a free local port. */
export function listen(app: Express): Promise<{ server: Server; url: string }> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, url: `http://127.0.0.1:${port}` });
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

export interface BotApiCall {
  method: string;
  body: unknown;
}

export const CHAT_ID = 42;

/** Local Bot API server: answers getMe, records every call, acknowledges the rest. */
export async function startBotApi() {
  const calls: BotApiCall[] = [];
  const app = express();
  app.use(express.json());
  app.use(express.raw({ type: 'multipart/form-data', limit: '10mb' }));
  app.post('/:bot/:method', (req, res) => {
    const { method } = req.params;
    calls.push({ method, body: req.body });
    if (method === 'getMe') {
      res.json({
        ok: true,
        result: {
          id: 1,
          is_bot: true,
          first_name: 'Forecast',
          username: 'forecast_test_bot',
          can_join_groups: true,
          can_read_all_group_messages: false,
          supports_inline_queries: false,
        },
      });
      return;
    }
    res.json({ ok: true, result: { message_id: calls.length, date: 0, chat: { id: CHAT_ID, type: 'private' } } });
  });

  const { server, url } = await listen(app);
  return {
    apiRoot: url,
    calls,
    sent: (method: string) => calls.filter((call) => call.method === method),
    close: () => closeServer(server),
  };
}

/** A private-chat message carrying `text` as a bot command. */
export function commandUpdate(updateId: number, text: string): Update {
  const [command = text] = text.split(' ');
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      date: 0,
      chat: { id: CHAT_ID, type: 'private', first_name: 'Test' },
      from: { id: CHAT_ID, is_bot: false, first_name: 'Test' },
      text,
      entities: [{ type: 'bot_command', offset: 0, length: command.length }],
    },
  };
}
