import { Api } from "grammy";

/** Resolves to the bot's username when the token is accepted by Telegram. */
export const validateTelegramToken = async (token: string): Promise<string> => {
  try {
    const me = await new Api(token).getMe();
    return me.username;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Telegram validation failed: ${message}`);
  }
};
