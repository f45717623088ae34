import { z } from 'zod';
import { ConfigError } from '@/services/errors';
import { LOG_LEVELS } from '@/services/logger';
import { DEFAULT_MODELS } from '@/models/registry';
import type { AppConfig } from './types';

export const DEFAULT_FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

const envSchema = z
  .object({
    BOT_TOKEN: z.string({ required_error: 'BOT_TOKEN env var not set' }).trim().min(1, 'BOT_TOKEN env var not set'),
    OPEN_METEO_URL: z.string().url().default(DEFAULT_FORECAST_URL),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    FETCH_MODE: z.enum(['concurrent', 'sequential']).default('concurrent'),
    TEXT_REPLY_LIMIT: z.coerce.number().int().positive().default(3800),
    PREVIEW_ROWS: z.coerce.number().int().positive().default(20),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    BOT_MODE: z.enum(['polling', 'webhook']).default('polling'),
    WEBHOOK_URL: z.string().url().optional(),
    WEBHOOK_SECRET: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, 'WEBHOOK_SECRET must be 1-256 of A-Z, a-z, 0-9, _ or -')
      .optional(),
    TELEGRAM_API_ROOT: z.string().url().optional(),
    PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  })
  .refine((env) => env.BOT_MODE !== 'webhook' || env.WEBHOOK_URL !== undefined, {
    message: 'WEBHOOK_URL is required when BOT_MODE=webhook',
    path: ['WEBHOOK_URL'],
  })
  .refine((env) => env.BOT_MODE !== 'webhook' || env.WEBHOOK_SECRET !== undefined, {
    message: 'WEBHOOK_SECRET is required when BOT_MODE=webhook',
    path: ['WEBHOOK_SECRET'],
  });

/**
 * Validates the process environment into a frozen AppConfig.
 * @throws ConfigError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so defaults apply.
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    const errors = result.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      errors,
    );
  }

  const parsed = result.data;
  return Object.freeze({
    botToken: parsed.BOT_TOKEN,
    botApiRoot: parsed.TELEGRAM_API_ROOT,
    logLevel: parsed.LOG_LEVEL,
    models: DEFAULT_MODELS,
    upstream: Object.freeze({
      baseUrl: parsed.OPEN_METEO_URL,
      timeoutMs: parsed.FETCH_TIMEOUT_MS,
      fetchMode: parsed.FETCH_MODE,
    }),
    presentation: Object.freeze({
      textLimit: parsed.TEXT_REPLY_LIMIT,
      previewRows: parsed.PREVIEW_ROWS,
    }),
    server: Object.freeze({
      mode: parsed.BOT_MODE,
      webhookUrl: parsed.WEBHOOK_URL,
      webhookSecret: parsed.WEBHOOK_SECRET,
      port: parsed.PORT,
    }),
  });
}
