import path from "node:path";

import dotenv from "dotenv";

import { ConfigurationError } from "./errors.js";
import { MAX_INTERVAL_MINUTES } from "./store/schemas.js";

type Env = Record<string, string | undefined>;

const required = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) throw new ConfigurationError(`Missing required env var: ${key}`);
  return value;
};

const parseIdList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .filter((item) => /^-?\d+$/.test(item));

const parseOptionalIdList = (value: string | undefined): string[] =>
  value ? parseIdList(value) : [];

const positiveInt = (env: Env, key: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  if (value > max) throw new ConfigurationError(`${key} must be at most ${max}, got "${raw}"`);
  return value;
};

export interface UserDefaults {
  model: string;
  heartbeatEnabled: boolean;
  heartbeatIntervalMinutes: number;
  maxContextMessages: number;
}

export interface AppConfig {
  botToken: string;
  anthropicApiKey: string;
  anthropicBaseUrl: string;
  anthropicTimeoutMs: number;
  admins: string[];
  allowedUsers: string[];
  dataDir: string;
  promptFile: string;
  userDefaults: UserDefaults;
  silent: boolean;
}

export const loadEnvFile = (): void => {
  dotenv.config();
};

export const loadConfig = (env: Env = process.env, argv: string[] = process.argv): AppConfig => {
  const botToken = required(env, "BOT_TOKEN");
  const anthropicApiKey = required(env, "ANTHROPIC_API_KEY");

  const admins = parseOptionalIdList(env.ADMIN_USER_IDS);
  const allowedUsersRaw = parseOptionalIdList(env.ALLOWED_USER_IDS);
  // an empty allowlist means the bot is open; admins only join a non-empty one
  const allowedUsers = allowedUsersRaw.length > 0 ? [...new Set([...allowedUsersRaw, ...admins])] : [];

  return {
    botToken,
    anthropicApiKey,
    anthropicBaseUrl: env.ANTHROPIC_BASE_URL ?? "https://api.anthropic.com",
    anthropicTimeoutMs: positiveInt(env, "ANTHROPIC_TIMEOUT_MS", 60_000),
    admins,
    allowedUsers,
    dataDir: path.resolve(env.DATA_DIR ?? "./data"),
    promptFile: path.resolve(env.PROMPT_FILE ?? "./prompts/system.md"),
    userDefaults: {
      model: env.DEFAULT_MODEL ?? "claude-sonnet-4-20250514",
      heartbeatEnabled: true,
      heartbeatIntervalMinutes: positiveInt(env, "HEARTBEAT_INTERVAL_MINUTES", 15, MAX_INTERVAL_MINUTES),
      maxContextMessages: positiveInt(env, "MAX_CONTEXT_MESSAGES", 50),
    },
    silent: argv.includes("--silent"),
  };
};
