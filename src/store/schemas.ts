import type { UserDefaults } from "../config.js";
import type { Message, Note, UsageRecord, User, UserConfig } from "./types.js";

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);
const isNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);
const isString = (value: unknown): value is string => typeof value === "string";
export const isPositiveInteger = (value: unknown): value is number =>
  isNumber(value) && Number.isInteger(value) && value > 0;

/** One year. Longer intervals would push the next run past the range of `Date`. */
export const MAX_INTERVAL_MINUTES = 525_600;

export const isHeartbeatInterval = (value: unknown): value is number =>
  isPositiveInteger(value) && value <= MAX_INTERVAL_MINUTES;

export const isUser = (value: unknown): value is User => {
  if (!isRecord(value)) return false;
  return (
    isString(value.userId) &&
    isString(value.displayName) &&
    (value.username === undefined || isString(value.username)) &&
    isString(value.registeredAt) &&
    isString(value.lastSeen) &&
    (value.status === "active" || value.status === "inactive" || value.status === "banned")
  );
};

export const isMessage = (value: unknown): value is Message => {
  if (!isRecord(value)) return false;
  return (
    isString(value.timestamp) &&
    (value.role === "user" || value.role === "assistant") &&
    isString(value.content)
  );
};

export const isNote = (value: unknown): value is Note => {
  if (!isRecord(value)) return false;
  return isString(value.timestamp) && isString(value.content);
};

export const isUsageRecord = (value: unknown): value is UsageRecord => {
  if (!isRecord(value)) return false;
  return (
    isString(value.timestamp) &&
    isString(value.userId) &&
    isString(value.model) &&
    (value.requestType === "heartbeat" || value.requestType === "user_response") &&
    isNumber(value.inputTokens) &&
    isNumber(value.outputTokens) &&
    isNumber(value.inputCost) &&
    isNumber(value.outputCost) &&
    isNumber(value.totalCost)
  );
};

export interface ParsedUserConfig {
  config: UserConfig;
  /** Names of fields that were missing or invalid and fell back to defaults. */
  repairedFields: string[];
}

/**
 * Reads a persisted config, keeping every well-typed field and filling the rest
 * from defaults. The owning user id always wins over whatever the file says.
 */
export const parseUserConfig = (
  value: unknown,
  userId: string,
  defaults: UserDefaults,
  now: string,
): ParsedUserConfig => {
  const raw: UnknownRecord = isRecord(value) ? value : {};
  const repairedFields: string[] = [];

  const pick = <T>(key: string, guard: (candidate: unknown) => candidate is T, fallback: T): T => {
    const candidate = raw[key];
    if (guard(candidate)) return candidate;
    repairedFields.push(key);
    return fallback;
  };

  const isBoolean = (candidate: unknown): candidate is boolean => typeof candidate === "boolean";
  const isNonEmptyString = (candidate: unknown): candidate is string => isString(candidate) && candidate.length > 0;

  if (raw.userId !== userId) repairedFields.push("userId");

  const createdAt = pick("createdAt", isNonEmptyString, now);
  return {
    config: {
      userId,
      model: pick("model", isNonEmptyString, defaults.model),
      heartbeatEnabled: pick("heartbeatEnabled", isBoolean, defaults.heartbeatEnabled),
      heartbeatIntervalMinutes: pick("heartbeatIntervalMinutes", isHeartbeatInterval, defaults.heartbeatIntervalMinutes),
      maxContextMessages: pick("maxContextMessages", isPositiveInteger, defaults.maxContextMessages),
      createdAt,
      updatedAt: pick("updatedAt", isNonEmptyString, createdAt),
    },
    repairedFields,
  };
};
