import path from "node:path";

import { askInstallerQuestions, assertAnswers } from "./prompts.js";
import { validateTelegramToken } from "./preflight.js";
import { initializeDataDir, writeEnvFile } from "./writers.js";

const run = async (): Promise<void> => {
  process.stdout.write("Companion installer\n\n");

  const answers = await askInstallerQuestions();
  assertAnswers(answers);

  process.stdout.write("- Validating Telegram token...\n");
  const username = await validateTelegramToken(answers.botToken);
  process.stdout.write(`  bot: @${username}\n`);

  process.stdout.write("- Writing .env...\n");
  await writeEnvFile(answers);

  process.stdout.write("- Initializing data directory...\n");
  await initializeDataDir(answers.dataDir);

  process.stdout.write("\nSetup complete\n");
  process.stdout.write(`- .env: ${path.resolve(".env")}\n`);
  process.stdout.write(`- data dir: ${path.resolve(answers.dataDir)}\n`);
  process.stdout.write("\nNext: npm run dev\n");
};

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Installer failed: ${message}\n`);
  process.exitCode = 1;
});
