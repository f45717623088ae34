/**
 * HTTP surface for webhook mode: Telegram updates plus a health check.
 */
import express from 'express';
import type { Express } from 'express';
import { webhookCallback } from 'grammy';
import type { Bot } from 'grammy';
import type { AppLogger } from '@/services/logger';
import healthRoutes from '@/routes/health';
import { createErrorHandler } from '@/middleware/errorHandler';

export const WEBHOOK_PATH = '/telegram/webhook';

/** Telegram re-delivers an update it gets no answer for, so slow forecasts finish after the 200. */
export const WEBHOOK_ANSWER_TIMEOUT_MS = 5_000;

export interface ServerOptions {
  secretToken: string;
  answerTimeoutMs?: number;
}

export function createServer(bot: Bot, logger: AppLogger, options: ServerOptions): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use('/health', healthRoutes);
  app.post(
    WEBHOOK_PATH,
    webhookCallback(bot, 'express', {
      secretToken: options.secretToken,
      onTimeout: 'return',
      timeoutMilliseconds: options.answerTimeoutMs ?? WEBHOOK_ANSWER_TIMEOUT_MS,
    }),
  );
  app.use(createErrorHandler(logger.getSubLogger({ name: 'http' })));

  return app;
}
