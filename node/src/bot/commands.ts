/**
 * Command handler: parses bot commands, runs the forecast pipeline and sends
 * the results through a ChatReply. Every failure ends here as a chat message.
 */

import type { ModelRegistry } from '@/models/registry';
import type { ForecastBuilder } from '@/services/forecast/aggregator';
import type { ForecastPresenter } from '@/format/presenter';
import { CHART_FILENAME } from '@/format/presenter';
import { codeBlock } from '@/format/textTable';
import type { AppLogger } from '@/services/logger';
import { ForecastBotError, NoValidModelsError, UpstreamError, UsageError, errorMessage } from '@/services/errors';
import type { CommandContext, ChatReply } from './types';
import { tokenize, validateForecastArgs } from './forecast.validation';

export const FORECAST_USAGE = 'Usage: /forecast <lat> <lon> <timezone> <YYYY-MM-DD> <start_hr> <end_hr> <models>';

export const WELCOME_TEXT =
  '🌤 Welcome!\n' +
  'Use:\n/forecast <lat> <lon> <timezone> <YYYY-MM-DD> <start_hr> <end_hr> <models>\n' +
  'Example:\n/forecast 22.26 69.40 Asia/Kolkata 2025-08-19 12 18 GFS,ICON\n' +
  'See /models';

export interface CommandHandlerDeps {
  registry: ModelRegistry;
  builder: ForecastBuilder;
  presenter: ForecastPresenter;
  logger: AppLogger;
}

export class CommandHandler {
  private readonly logger: AppLogger;

  constructor(private readonly deps: CommandHandlerDeps) {
    this.logger = deps.logger.getSubLogger({ name: 'commands' });
  }

  async start(ctx: CommandContext): Promise<void> {
    await ctx.reply.text(WELCOME_TEXT);
  }

  async models(ctx: CommandContext): Promise<void> {
    await ctx.reply.text('Supported models: ' + this.deps.registry.listNames().join(', '));
  }

  async forecast(ctx: CommandContext): Promise<void> {
    this.logger.info(`forecast from chat ${ctx.chatId ?? 'unknown'}: ${ctx.argsText}`);
    try {
      await this.runForecast(ctx);
    } catch (error) {
      await this.replyWithError(ctx.reply, error);
    }
  }

  private async runForecast(ctx: CommandContext): Promise<void> {
    const { reply } = ctx;
    const validation = validateForecastArgs(tokenize(ctx.argsText));
    if (!validation.success) {
      throw new UsageError(FORECAST_USAGE, validation.error);
    }

    const args = validation.data;
    const selection = this.deps.registry.selectKnown(args.models.split(','));
    if (selection.unknown.length) {
      this.logger.debug(`Dropping unknown models: ${selection.unknown.join(', ')}`);
    }
    if (selection.known.length === 0) {
      throw new NoValidModelsError();
    }

    const table = await this.deps.builder.build({
      latitude: args.latitude,
      longitude: args.longitude,
      timezone: args.timezone,
      date: args.date,
      startHour: args.startHour,
      endHour: args.endHour,
      models: selection.known,
    });

    const plan = this.deps.presenter.planTable(table);
    if (plan.kind === 'inline') {
      await reply.text(codeBlock(plan.text), { markdown: true });
    } else {
      await reply.document(Buffer.from(plan.csv, 'utf8'), plan.filename, plan.caption);
      await reply.text(codeBlock(plan.preview), { markdown: true });
    }

    const chart = await this.deps.presenter.renderChart(table, selection.known);
    await reply.photo(chart, CHART_FILENAME);
  }

  private async replyWithError(reply: ChatReply, error: unknown): Promise<void> {
    if (error instanceof UsageError) {
      await reply.text([error.message, ...error.issues].join('\n'));
      return;
    }
    if (error instanceof UpstreamError) {
      this.logger.warn(`Forecast failed upstream (${error.code}): ${error.message}`);
      await reply.text(`Error: ${error.message}`);
      return;
    }
    if (error instanceof ForecastBotError) {
      await reply.text(error.message);
      return;
    }
    this.logger.error('forecast error', error);
    await reply.text(`Error: ${errorMessage(error)}`);
  }
}
