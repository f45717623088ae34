// Transport-independent view of a chat the command handler replies into.

export interface TextOptions {
  /** Render as Markdown (code blocks). */
  markdown?: boolean;
}

export interface ChatReply {
  text(message: string, options?: TextOptions): Promise<void>;
  document(content: Buffer, filename: string, caption?: string): Promise<void>;
  photo(content: Buffer, filename: string): Promise<void>;
}

export interface CommandContext {
  chatId?: number | string;
  /** Raw text after the command, e.g. "22.26 69.40 UTC ...". */
  argsText: string;
  reply: ChatReply;
}

export type CommandName = 'start' | 'help' | 'models' | 'forecast';
