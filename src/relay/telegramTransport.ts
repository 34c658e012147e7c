import type { ChatTransport } from "../heartbeat/types.js";
import { createLogger } from "../logger.js";

const log = createLogger("telegram-transport");

// Telegram rejects longer texts.
export const TELEGRAM_MESSAGE_LIMIT = 4096;

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

export const splitMessage = (text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] => {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const cut = rest.lastIndexOf("\n", limit);
    let end = cut > 0 ? cut : limit;
    // Keep surrogate pairs (emoji) whole.
    if (end > 1 && isHighSurrogate(rest.charCodeAt(end - 1))) end -= 1;
    chunks.push(rest.slice(0, end));
    rest = rest.slice(end).replace(/^\n/, "");
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
};

/** The part of grammy's `Api` used for delivery. */
export interface MessageApi {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

/** Private chats share the user's id, so a user id doubles as the chat id. */
export class TelegramTransport implements ChatTransport {
  constructor(private readonly api: MessageApi) {}

  async send(userId: string, text: string): Promise<void> {
    for (const chunk of splitMessage(text)) {
      await this.api.sendMessage(userId, chunk);
    }
    log.debug("Message delivered", { userId, length: text.length });
  }
}
