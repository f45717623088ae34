/**
 * Config Types
 * Runtime configuration handed to every component at construction time.
 */

import type { LogLevelName } from '@/services/logger';
import type { ModelEntry } from '@/models/registry';

export type FetchMode = 'concurrent' | 'sequential';

export type BotMode = 'polling' | 'webhook';

export type UpstreamConfig = {
  baseUrl: string;
  timeoutMs: number;
  fetchMode: FetchMode;
};

export type PresentationConfig = {
  /** Rendered text longer than this goes out as a CSV file plus a preview. */
  textLimit: number;
  previewRows: number;
};

export type ServerConfig = {
  mode: BotMode;
  webhookUrl?: string;
  /** Echoed by Telegram in `X-Telegram-Bot-Api-Secret-Token` on every webhook call. */
  webhookSecret?: string;
  port: number;
};

export type AppConfig = Readonly<{
  botToken: string;
  /** Bot API server; unset means Telegram's public one. */
  botApiRoot?: string;
  logLevel: LogLevelName;
  models: readonly ModelEntry[];
  upstream: Readonly<UpstreamConfig>;
  presentation: Readonly<PresentationConfig>;
  server: Readonly<ServerConfig>;
}>;
