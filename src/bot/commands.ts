import { InlineKeyboard, type Bot } from "grammy";

import { describeError } from "../errors.js";
import type { HeartbeatResult, HeartbeatStatus } from "../heartbeat/types.js";
import { logger } from "../logger.js";
import { MAX_INTERVAL_MINUTES, isHeartbeatInterval } from "../store/schemas.js";
import type { Note, User, UserConfig } from "../store/types.js";
import { ensureScheduled, onboardUser, scheduleFromConfig } from "./onboarding.js";
import type { BotContext } from "./types.js";

const heartbeatOnData = "heartbeat:on";
const heartbeatOffData = "heartbeat:off";

export type HeartbeatCommand =
  | { action: "status" }
  | { action: "on" }
  | { action: "off" }
  | { action: "interval"; minutes: number }
  | { action: "now" }
  | { action: "debug" }
  | { action: "invalid"; reason: string };

export const parseHeartbeatCommand = (input: string): HeartbeatCommand => {
  const [action = "", value] = input.trim().toLowerCase().split(/\s+/, 2);
  switch (action) {
    case "":
    case "status":
      return { action: "status" };
    case "on":
      return { action: "on" };
    case "off":
      return { action: "off" };
    case "now":
      return { action: "now" };
    case "debug":
      return { action: "debug" };
    case "interval": {
      const minutes = Number(value);
      if (!value || !isHeartbeatInterval(minutes)) {
        return {
          action: "invalid",
          reason: `Usage: /heartbeat interval <minutes> (a whole number from 1 to ${MAX_INTERVAL_MINUTES})`,
        };
      }
      return { action: "interval", minutes };
    }
    default:
      return { action: "invalid", reason: "Usage: /heartbeat [status|on|off|interval <minutes>|now|debug]" };
  }
};

export const formatHeartbeatStatus = (status: HeartbeatStatus, config: UserConfig): string => {
  const lines = [
    `Heartbeat: ${status.enabled ? "on" : "paused"}`,
    `Interval: every ${config.heartbeatIntervalMinutes} min`,
    `Next check: ${status.jobExists && status.nextScheduledTime ? status.nextScheduledTime.toISOString() : "not scheduled"}`,
  ];
  if (status.running) lines.push("A check is running right now.");
  return lines.join("\n");
};

export const formatHeartbeatResult = (result: HeartbeatResult | null, dryRun: boolean): string => {
  if (!result) return "A heartbeat is already running, try again in a moment.";
  if (result.error && !result.toolInvoked) return `Heartbeat failed: ${result.error}`;
  const lines = [dryRun ? "Heartbeat dry run" : "Heartbeat done"];
  lines.push(
    result.toolInvoked
      ? `Decision: send message${dryRun ? " (not delivered)" : ""}\n${result.message ?? ""}`
      : "Decision: stay silent",
  );
  if (dryRun && result.reasoning) lines.push(`Reasoning:\n${result.reasoning}`);
  if (result.error) lines.push(`Error: ${result.error}`);
  return lines.join("\n\n");
};

export const formatNotes = (notes: Note[]): string =>
  notes.length === 0
    ? "No notes yet."
    : notes.map((note, index) => `${index + 1}. [${note.timestamp}] ${note.content}`).join("\n");

export const formatUserList = (users: User[], scheduled: Set<string>): string =>
  users.length === 0
    ? "No registered users."
    : users
        .map(
          (user) =>
            `${user.userId} ${user.displayName}${user.username ? ` (@${user.username})` : ""} · ${user.status}` +
            ` · ${scheduled.has(user.userId) ? "scheduled" : "no heartbeat"} · last seen ${user.lastSeen}`,
        )
        .join("\n");

const buildHeartbeatKeyboard = (enabled: boolean): InlineKeyboard =>
  new InlineKeyboard().text(enabled ? "Pause heartbeat" : "Resume heartbeat", enabled ? heartbeatOffData : heartbeatOnData);

const requireUser = async (ctx: BotContext): Promise<string | null> => {
  const fromId = ctx.from?.id;
  if (!fromId) {
    await ctx.reply("Could not identify the user.");
    return null;
  }
  const userId = String(fromId);
  if ((await ctx.services.access.check(userId)) !== "allowed") {
    await ctx.reply("Sorry, you are not allowed to use this bot.");
    return null;
  }
  return userId;
};

const requireAdmin = async (ctx: BotContext): Promise<string | null> => {
  const userId = await requireUser(ctx);
  if (!userId) return null;
  if (!ctx.services.access.isAdmin(userId)) {
    await ctx.reply("This command is for admins only.");
    return null;
  }
  return userId;
};

const setHeartbeatEnabled = async (ctx: BotContext, userId: string, enabled: boolean): Promise<string> => {
  const { storage, scheduler, registry } = ctx.services;
  const store = await storage.getUserStorage(userId);
  await store.updateConfig({ heartbeatEnabled: enabled });

  if (scheduler.getStatus(userId).jobExists) {
    if (enabled) scheduler.resumeUser(userId);
    else scheduler.pauseUser(userId);
  } else if ((await registry.getUser(userId))?.status === "active") {
    await scheduleFromConfig(ctx.services, userId);
  }
  return enabled ? "Heartbeat resumed. I'll check in with you again." : "Heartbeat paused. I won't check in until you resume it.";
};

const parseTargetId = (ctx: BotContext): string | null => {
  const value = (typeof ctx.match === "string" ? ctx.match : "").trim();
  return /^-?\d+$/.test(value) ? value : null;
};

export const registerCommands = (bot: Bot<BotContext>): void => {
  bot.command("start", async (ctx) => {
    const userId = await requireUser(ctx);
    const from = ctx.from;
    if (!userId || !from) return;
    await ctx.services.queue.run(userId, () => onboardUser(ctx.services, from));
    await ctx.reply(
      "Hi! I'm online and will check in with you from time to time.\n" +
        "Use /heartbeat to see or change how often, and /status for usage.",
    );
  });

  bot.command("status", async (ctx) => {
    const userId = await requireUser(ctx);
    if (!userId) return;
    const store = await ctx.services.storage.getUserStorage(userId);
    const config = await store.getConfig();
    const report = await ctx.services.ledger.formatReport(userId, config.model);
    const status = ctx.services.scheduler.getStatus(userId);
    logger.info("Status command requested", { userId });
    await ctx.reply(`${report}\n\n${formatHeartbeatStatus(status, config)}`);
  });

  bot.command("heartbeat", async (ctx) => {
    const userId = await requireUser(ctx);
    if (!userId) return;
    const { storage, scheduler } = ctx.services;
    const command = parseHeartbeatCommand(ctx.match);
    logger.info("Heartbeat command", { userId, action: command.action });

    switch (command.action) {
      case "invalid":
        await ctx.reply(command.reason);
        return;
      case "status": {
        const config = await (await storage.getUserStorage(userId)).getConfig();
        const status = scheduler.getStatus(userId);
        await ctx.reply(formatHeartbeatStatus(status, config), {
          reply_markup: buildHeartbeatKeyboard(status.enabled),
        });
        return;
      }
      case "on":
      case "off":
        await ctx.reply(await setHeartbeatEnabled(ctx, userId, command.action === "on"));
        return;
      case "interval": {
        const store = await storage.getUserStorage(userId);
        const config = await store.updateConfig({ heartbeatIntervalMinutes: command.minutes });
        if (scheduler.getStatus(userId).jobExists) {
          scheduler.addUser(userId, command.minutes, scheduler.isEnabled(userId));
        }
        await ctx.reply(formatHeartbeatStatus(scheduler.getStatus(userId), config));
        return;
      }
      case "now":
      case "debug": {
        const dryRun = command.action === "debug";
        await ctx.reply(dryRun ? "Running a dry-run heartbeat..." : "Running a heartbeat now...");
        const result = await scheduler.triggerNow(userId, { dryRun });
        await ctx.reply(formatHeartbeatResult(result, dryRun));
        return;
      }
    }
  });

  bot.command("model", async (ctx) => {
    const userId = await requireUser(ctx);
    if (!userId) return;
    const store = await ctx.services.storage.getUserStorage(userId);
    const model = ctx.match.trim();
    if (!model) {
      const config = await store.getConfig();
      await ctx.reply(`Model: ${config.model}\nUsage: /model <model-id>`);
      return;
    }
    const config = await store.updateConfig({ model });
    await ctx.reply(`Model set to ${config.model}`);
  });

  bot.command("notes", async (ctx) => {
    const userId = await requireUser(ctx);
    if (!userId) return;
    const notes = await (await ctx.services.storage.getUserStorage(userId)).getNotes();
    await ctx.reply(formatNotes(notes));
  });

  bot.command("reset", async (ctx) => {
    const userId = await requireUser(ctx);
    if (!userId) return;
    const store = await ctx.services.storage.getUserStorage(userId);
    await ctx.services.queue.run(userId, async () => {
      await store.clearMessages();
      await store.clearNotes();
    });
    logger.info("Conversation reset", { userId });
    await ctx.reply("Conversation and notes cleared. Settings are unchanged.");
  });

  bot.command("users", async (ctx) => {
    if (!(await requireAdmin(ctx))) return;
    const users = await ctx.services.registry.listUsers("all");
    await ctx.reply(formatUserList(users, new Set(ctx.services.scheduler.listUsers())));
  });

  bot.command("deactivate", async (ctx) => {
    if (!(await requireAdmin(ctx))) return;
    const targetId = parseTargetId(ctx);
    if (!targetId) {
      await ctx.reply("Usage: /deactivate <userId>");
      return;
    }
    const user = await ctx.services.registry.deactivateUser(targetId);
    if (!user) {
      await ctx.reply(`Unknown user ${targetId}`);
      return;
    }
    // the registry does not stop heartbeats on its own
    ctx.services.scheduler.removeUser(targetId);
    await ctx.reply(`User ${targetId} deactivated and heartbeat removed.`);
  });

  bot.command("activate", async (ctx) => {
    if (!(await requireAdmin(ctx))) return;
    const targetId = parseTargetId(ctx);
    if (!targetId) {
      await ctx.reply("Usage: /activate <userId>");
      return;
    }
    const user = await ctx.services.registry.activateUser(targetId);
    if (!user) {
      await ctx.reply(`Unknown user ${targetId}`);
      return;
    }
    const nextRunAt = await ensureScheduled(ctx.services, targetId);
    await ctx.reply(`User ${targetId} activated. Next heartbeat ${nextRunAt.toISOString()}.`);
  });

  bot.command("ban", async (ctx) => {
    if (!(await requireAdmin(ctx))) return;
    const targetId = parseTargetId(ctx);
    if (!targetId) {
      await ctx.reply("Usage: /ban <userId>");
      return;
    }
    const user = await ctx.services.registry.banUser(targetId);
    if (!user) {
      await ctx.reply(`Unknown user ${targetId}`);
      return;
    }
    ctx.services.scheduler.removeUser(targetId);
    await ctx.reply(`User ${targetId} banned.`);
  });

  bot.callbackQuery([heartbeatOnData, heartbeatOffData], async (ctx) => {
    const userId = await requireUser(ctx);
    if (!userId) {
      await ctx.answerCallbackQuery({ text: "Not allowed", show_alert: true });
      return;
    }
    const enabled = ctx.callbackQuery.data === heartbeatOnData;
    try {
      const message = await setHeartbeatEnabled(ctx, userId, enabled);
      await ctx.answerCallbackQuery({ text: enabled ? "Resumed" : "Paused" });
      await ctx.reply(message);
    } catch (error) {
      logger.error("Heartbeat toggle failed", { userId, error: describeError(error) });
      await ctx.answerCallbackQuery({ text: "Something went wrong", show_alert: true });
    }
  });
};

export const botCommandList = [
  { command: "start", description: "Start talking to the bot" },
  { command: "status", description: "Usage and heartbeat status" },
  { command: "heartbeat", description: "Show or change the heartbeat" },
  { command: "model", description: "Show or set the model" },
  { command: "notes", description: "Show the assistant's notes" },
  { command: "reset", description: "Forget the conversation and notes" },
];
