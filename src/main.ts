import path from "node:path";

import { Api } from "grammy";

import { AnthropicClient } from "./assistant/client.js";
import { AssistantHeartbeatExecutor } from "./assistant/heartbeat.js";
import { AssistantResponder } from "./assistant/responder.js";
import { AccessPolicy } from "./auth/access.js";
import { botCommandList } from "./bot/commands.js";
import { createTelegramBot } from "./bot/index.js";
import { loadConfig, loadEnvFile } from "./config.js";
import { HeartbeatScheduler } from "./heartbeat/scheduler.js";
import type { ChatTransport } from "./heartbeat/types.js";
import { logger, errorMeta } from "./logger.js";
import { TelegramTransport } from "./relay/telegramTransport.js";
import { STORE_FILES } from "./store/files.js";
import { KeyedQueue } from "./store/lock.js";
import { StorageManager } from "./store/storageManager.js";
import { UsageLedger } from "./usage/ledger.js";
import { UserRegistry } from "./users/registry.js";

const notifyAdmins = async (transport: ChatTransport, admins: string[], text: string): Promise<void> => {
  await Promise.all(
    admins.map(async (adminId) => {
      try {
        await transport.send(adminId, text);
      } catch (error) {
        logger.warn("Admin notification failed", { adminId, ...errorMeta(error) });
      }
    }),
  );
};

const bootstrap = async (): Promise<void> => {
  loadEnvFile();
  const config = loadConfig();
  logger.info("Bootstrapping companion", {
    dataDir: config.dataDir,
    defaultModel: config.userDefaults.model,
    defaultIntervalMinutes: config.userDefaults.heartbeatIntervalMinutes,
    openAccess: config.allowedUsers.length === 0,
  });

  const registry = new UserRegistry(config.dataDir);
  await registry.init();
  const storage = new StorageManager(config.dataDir, config.userDefaults);
  const ledger = new UsageLedger(path.join(config.dataDir, STORE_FILES.usageLedger));
  const client = new AnthropicClient({
    apiKey: config.anthropicApiKey,
    baseUrl: config.anthropicBaseUrl,
    timeoutMs: config.anthropicTimeoutMs,
  });
  const transport = new TelegramTransport(new Api(config.botToken));

  const scheduler = new HeartbeatScheduler({
    registry,
    storage,
    executor: new AssistantHeartbeatExecutor({
      client,
      transport,
      ledger,
      promptFile: config.promptFile,
    }),
  });

  const bot = createTelegramBot(config.botToken, {
    access: new AccessPolicy({ admins: config.admins, allowedUsers: config.allowedUsers }, registry),
    registry,
    storage,
    scheduler,
    responder: new AssistantResponder({ client, storage, ledger, promptFile: config.promptFile }),
    ledger,
    queue: new KeyedQueue(),
  });

  await bot.api.setMyCommands(botCommandList);
  await scheduler.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down", { signal });
    scheduler.stop();
    await bot.stop();
    await scheduler.drain();
    if (!config.silent) {
      await notifyAdmins(transport, config.admins, "Companion service stopped");
    }
    logger.info("Shutdown complete");
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", errorMeta(error));
        process.exitCode = 1;
      });
    });
  }

  if (!config.silent) {
    await notifyAdmins(transport, config.admins, "Companion service started");
  }

  logger.info("Bot starting", { mode: "polling" });
  try {
    // resolves once polling stops
    await bot.start({
      onStart: (info) => logger.info("Bot started", { username: info.username }),
    });
  } catch (error) {
    scheduler.stop();
    throw error;
  }
};

bootstrap().catch((error: unknown) => {
  logger.error("Bootstrap failed", errorMeta(error));
  process.exitCode = 1;
});
