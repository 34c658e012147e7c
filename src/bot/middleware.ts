import type { MiddlewareFn } from "grammy";

import { logger, errorMeta } from "../logger.js";
import type { BotContext, BotServices } from "./types.js";

export const attachServices = (services: BotServices): MiddlewareFn<BotContext> => {
  return async (ctx, next) => {
    ctx.services = services;
    await next();
  };
};

/** Refreshes `lastSeen` for every update from a registered user. */
export const trackActivity = (): MiddlewareFn<BotContext> => {
  return async (ctx, next) => {
    const fromId = ctx.from?.id;
    if (fromId !== undefined) {
      const userId = String(fromId);
      try {
        if (await ctx.services.registry.getUser(userId)) {
          await ctx.services.registry.updateLastSeen(userId);
        }
      } catch (error) {
        logger.warn("Failed to track user activity", { userId, ...errorMeta(error) });
      }
    }
    await next();
  };
};
