import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { STORE_FILES } from "../src/store/files.js";
import type { InstallerAnswers } from "./prompts.js";

export const buildEnvFile = (answers: InstallerAnswers): string =>
  [
    `BOT_TOKEN=${answers.botToken}`,
    `ANTHROPIC_API_KEY=${answers.anthropicApiKey}`,
    `ADMIN_USER_IDS=${answers.adminUserIds.join(",")}`,
    `ALLOWED_USER_IDS=${answers.allowedUserIds.join(",")}`,
    `DATA_DIR=${answers.dataDir}`,
    `DEFAULT_MODEL=${answers.defaultModel}`,
    `HEARTBEAT_INTERVAL_MINUTES=${answers.heartbeatIntervalMinutes}`,
    `MAX_CONTEXT_MESSAGES=${answers.maxContextMessages}`,
  ].join("\n") + "\n";

export const writeEnvFile = async (answers: InstallerAnswers, target = path.resolve(".env")): Promise<void> => {
  await writeFile(target, buildEnvFile(answers), "utf8");
};

/** Creates the data directory with an empty registry, leaving existing data alone. */
export const initializeDataDir = async (dataDir: string): Promise<string[]> => {
  const root = path.resolve(dataDir);
  await mkdir(path.join(root, STORE_FILES.usersDir), { recursive: true });

  const created: string[] = [];
  const registryPath = path.join(root, STORE_FILES.registry);
  try {
    await stat(registryPath);
  } catch {
    await writeFile(registryPath, "[]\n", "utf8");
    created.push(registryPath);
  }
  return created;
};
