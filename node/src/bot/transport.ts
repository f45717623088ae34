/**
 * grammy adapter: registers the commands and maps grammy's context onto ChatReply.
 */
import { Bot, GrammyError, HttpError, InputFile } from 'grammy';
import type { CommandContext as GrammyCommandContext, Context } from 'grammy';
import type { AppLogger } from '@/services/logger';
import type { CommandHandler } from './commands';
import type { ChatReply, CommandContext, CommandName } from './types';

export const BOT_COMMANDS: ReadonlyArray<{ command: CommandName; description: string }> = [
  { command: 'start', description: 'Show usage' },
  { command: 'help', description: 'Show usage' },
  { command: 'models', description: 'List supported forecast models' },
  { command: 'forecast', description: 'Compare hourly forecasts across models' },
];

export function toChatReply(ctx: Context): ChatReply {
  return {
    async text(message, options) {
      await ctx.reply(message, options?.markdown ? { parse_mode: 'Markdown' } : undefined);
    },
    async document(content, filename, caption) {
      await ctx.replyWithDocument(new InputFile(content, filename), caption ? { caption } : undefined);
    },
    async photo(content, filename) {
      await ctx.replyWithPhoto(new InputFile(content, filename));
    },
  };
}

function toCommandContext(ctx: GrammyCommandContext<Context>): CommandContext {
  return {
    chatId: ctx.chat?.id,
    argsText: ctx.match,
    reply: toChatReply(ctx),
  };
}

export interface BotOptions {
  /** Bot API server root; grammy defaults to Telegram's. */
  apiRoot?: string;
}

export function createBot(token: string, handler: CommandHandler, logger: AppLogger, options: BotOptions = {}): Bot {
  const log = logger.getSubLogger({ name: 'transport' });
  const bot = new Bot(token, options.apiRoot ? { client: { apiRoot: options.apiRoot } } : undefined);

  bot.command(['start', 'help'], (ctx) => handler.start(toCommandContext(ctx)));
  bot.command('models', (ctx) => handler.models(toCommandContext(ctx)));
  bot.command('forecast', (ctx) => handler.forecast(toCommandContext(ctx)));

  bot.catch((err) => {
    const { error } = err;
    const chat = err.ctx.chat?.id ?? 'unknown';
    if (error instanceof GrammyError) {
      log.error(`Telegram rejected a request for chat ${chat}: ${error.description}`);
    } else if (error instanceof HttpError) {
      log.error(`Could not reach Telegram for chat ${chat}`, error);
    } else {
      log.error(`Unhandled error for chat ${chat}`, error);
    }
  });

  return bot;
}

export async function registerCommands(bot: Bot): Promise<void> {
  await bot.api.setMyCommands([...BOT_COMMANDS]);
}
