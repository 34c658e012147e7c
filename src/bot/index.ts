import { Bot } from "grammy";

import { attachServices, trackActivity } from "./middleware.js";
import { registerCommands } from "./commands.js";
import { onboardUser } from "./onboarding.js";
import { logger, errorMeta } from "../logger.js";
import { splitMessage } from "../relay/telegramTransport.js";
import type { BotContext, BotServices } from "./types.js";

export const FAILURE_NOTICE = "Sorry, something went wrong. Please try again in a moment.";

export const createTelegramBot = (token: string, services: BotServices): Bot<BotContext> => {
  const bot = new Bot<BotContext>(token);
  bot.use(attachServices(services));
  bot.use(trackActivity());
  registerCommands(bot);

  bot.on("message:text", async (ctx) => {
    const from = ctx.from;
    const userId = String(from.id);
    const text = ctx.message.text.trim();
    if (!text || text.startsWith("/")) return;

    logger.debug("Incoming telegram message", {
      chatId: ctx.chat.id,
      userId,
      username: from.username ?? null,
      textLength: text.length,
    });

    const access = await ctx.services.access.check(userId);
    if (access !== "allowed") {
      logger.warn("Refused telegram message", { userId, reason: access });
      await ctx.reply("Sorry, you are not allowed to use this bot.");
      return;
    }

    await ctx.services.queue.run(userId, async () => {
      try {
        const user = await onboardUser(ctx.services, from);
        if (user.status !== "active") {
          logger.info("Ignoring message from inactive user", { userId, status: user.status });
          await ctx.reply("Your account is inactive. Ask an admin to reactivate it.");
          return;
        }
        await ctx.replyWithChatAction("typing");
        const reply = await ctx.services.responder.respond(userId, text);
        if (!reply) return;
        for (const chunk of splitMessage(reply)) {
          await ctx.reply(chunk);
        }
      } catch (error) {
        logger.error("Direct response failed", { userId, ...errorMeta(error) });
        await ctx.reply(FAILURE_NOTICE);
      }
    });
  });

  bot.catch((err) => {
    logger.error("Unhandled bot error", { updateId: err.ctx.update.update_id, ...errorMeta(err.error) });
  });

  return bot;
};
