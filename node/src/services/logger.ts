// src/services/logger.ts — structured logging for the bot
import { Logger } from 'tslog';
import type { ILogObj } from 'tslog';

export type AppLogger = Logger<ILogObj>;

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  name?: string;
  minLevel?: LogLevelName;
  /** 'hidden' silences output (tests). */
  type?: 'pretty' | 'json' | 'hidden';
}

export function createLogger(options: LoggerOptions = {}): AppLogger {
  return new Logger<ILogObj>({
    name: options.name ?? 'forecast-bot',
    minLevel: LOG_LEVELS.indexOf(options.minLevel ?? 'info'),
    prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
    type: options.type ?? 'pretty',
  });
}
