import { logger } from "../logger.js";
import type { User } from "../store/types.js";
import type { BotServices } from "./types.js";

export interface TelegramSender {
  id: number;
  first_name: string;
  last_name?: string;
  username?: string;
}

export const displayNameOf = (from: TelegramSender): string =>
  [from.first_name, from.last_name].filter(Boolean).join(" ").trim() || String(from.id);

/**
 * Registers the sender on first contact and gives an active user a heartbeat if
 * the scheduler has none yet, using the user's persisted settings.
 */
export const onboardUser = async (
  services: Pick<BotServices, "registry" | "storage" | "scheduler">,
  from: TelegramSender,
): Promise<User> => {
  const userId = String(from.id);
  const user = await services.registry.registerUser(userId, displayNameOf(from), from.username);
  if (user.status !== "active") return user;

  await ensureScheduled(services, userId);
  return user;
};

/** Arms the user's heartbeat from stored config unless a job already runs; an existing cadence is kept. */
export const ensureScheduled = async (
  services: Pick<BotServices, "storage" | "scheduler">,
  userId: string,
): Promise<Date> => {
  const { nextScheduledTime } = services.scheduler.getStatus(userId);
  return nextScheduledTime ?? scheduleFromConfig(services, userId);
};

export const scheduleFromConfig = async (
  services: Pick<BotServices, "storage" | "scheduler">,
  userId: string,
): Promise<Date> => {
  const store = await services.storage.getUserStorage(userId);
  const config = await store.getConfig();
  const nextRunAt = services.scheduler.addUser(userId, config.heartbeatIntervalMinutes, config.heartbeatEnabled);
  logger.info("User heartbeat armed from stored config", { userId });
  return nextRunAt;
};
