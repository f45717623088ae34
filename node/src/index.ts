// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import type { Server } from 'http';
import type { Bot } from 'grammy';
import { loadConfig } from '@/config/appConfig';
import type { AppConfig } from '@/config/types';
import { createLogger } from '@/services/logger';
import type { AppLogger } from '@/services/logger';
import { ConfigError } from '@/services/errors';
import { createModelRegistry } from '@/models/registry';
import { OpenMeteoSeriesFetcher } from '@/services/providers/weather/open-meteo-series';
import { ForecastAggregator } from '@/services/forecast/aggregator';
import { Presenter } from '@/format/presenter';
import { CommandHandler } from '@/bot/commands';
import { createBot, registerCommands } from '@/bot/transport';
import { WEBHOOK_PATH, createServer } from '@/server';
import { setupProcessHandlers } from '@/stability/errorHandlers';

/** Wires every component from one immutable config. */
function createApp(config: AppConfig, logger: AppLogger): Bot {
  const registry = createModelRegistry(config.models);
  const fetcher = new OpenMeteoSeriesFetcher({
    baseUrl: config.upstream.baseUrl,
    timeoutMs: config.upstream.timeoutMs,
    logger,
  });
  const builder = new ForecastAggregator({ registry, fetcher, logger, fetchMode: config.upstream.fetchMode });
  const handler = new CommandHandler({ registry, builder, presenter: new Presenter(config.presentation), logger });
  return createBot(config.botToken, handler, logger, { apiRoot: config.botApiRoot });
}

async function main(): Promise<void> {
  const bootLogger = createLogger({ name: 'forecast-bot' });

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      bootLogger.fatal(error.message);
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger({ name: 'forecast-bot', minLevel: config.logLevel });
  const bot = createApp(config, logger);
  let server: Server | null = null;

  setupProcessHandlers(logger, async () => {
    if (server) {
      const closing = server;
      await new Promise<void>((resolve) => closing.close(() => resolve()));
    }
    if (bot.isRunning()) await bot.stop();
  });

  await registerCommands(bot);

  const { webhookUrl, webhookSecret } = config.server;
  if (config.server.mode === 'webhook' && webhookUrl && webhookSecret) {
    const app = createServer(bot, logger, { secretToken: webhookSecret });
    const port = config.server.port;
    server = app.listen(port, () => {
      logger.info(`Webhook server listening on port ${port}`);
    });
    await bot.api.setWebhook(new URL(WEBHOOK_PATH, webhookUrl).toString(), { secret_token: webhookSecret });
    return;
  }

  await bot.api.deleteWebhook();
  await bot.start({
    onStart: (me) => {
      logger.info(`Polling as @${me.username}`);
    },
  });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
