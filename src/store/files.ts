export const STORE_FILES = {
  registry: "users.json",
  usageLedger: "api_usage.jsonl",
  usersDir: "users",
} as const;

export const USER_FILES = {
  messages: "messages.json",
  notes: "notes.json",
  config: "user_config.json",
} as const;

const USER_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export const isValidUserId = (userId: string): boolean => USER_ID_PATTERN.test(userId);
