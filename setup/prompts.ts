import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { MAX_INTERVAL_MINUTES, isHeartbeatInterval } from "../src/store/schemas.js";

export interface InstallerAnswers {
  botToken: string;
  anthropicApiKey: string;
  adminUserIds: string[];
  allowedUserIds: string[];
  dataDir: string;
  defaultModel: string;
  heartbeatIntervalMinutes: number;
  maxContextMessages: number;
}

export const parseIds = (raw: string): string[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => /^-?\d+$/.test(item));

export const assertAnswers = (answers: InstallerAnswers): void => {
  if (!answers.botToken) throw new Error("BOT_TOKEN is required");
  if (!answers.anthropicApiKey) throw new Error("ANTHROPIC_API_KEY is required");
  if (!isHeartbeatInterval(answers.heartbeatIntervalMinutes)) {
    throw new Error(`HEARTBEAT_INTERVAL_MINUTES must be a whole number from 1 to ${MAX_INTERVAL_MINUTES}`);
  }
  if (!Number.isInteger(answers.maxContextMessages) || answers.maxContextMessages <= 0) {
    throw new Error("MAX_CONTEXT_MESSAGES must be a positive integer");
  }
};

export const askInstallerQuestions = async (): Promise<InstallerAnswers> => {
  const rl = createInterface({ input, output });
  try {
    const botToken = (await rl.question("BOT_TOKEN: ")).trim();
    const anthropicApiKey = (await rl.question("ANTHROPIC_API_KEY: ")).trim();
    const adminRaw = (await rl.question("ADMIN_USER_IDS (comma separated, optional): ")).trim();
    const allowedRaw = (await rl.question("ALLOWED_USER_IDS (comma separated, empty = open): ")).trim();
    const dataDirRaw = (await rl.question("DATA_DIR (./data): ")).trim();
    const modelRaw = (await rl.question("DEFAULT_MODEL (claude-sonnet-4-20250514): ")).trim();
    const intervalRaw = (await rl.question("HEARTBEAT_INTERVAL_MINUTES (15): ")).trim();
    const contextRaw = (await rl.question("MAX_CONTEXT_MESSAGES (50): ")).trim();

    return {
      botToken,
      anthropicApiKey,
      adminUserIds: parseIds(adminRaw),
      allowedUserIds: parseIds(allowedRaw),
      dataDir: dataDirRaw || "./data",
      defaultModel: modelRaw || "claude-sonnet-4-20250514",
      heartbeatIntervalMinutes: Number(intervalRaw || "15"),
      maxContextMessages: Number(contextRaw || "50"),
    };
  } finally {
    rl.close();
  }
};
