import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const baseEnv = { BOT_TOKEN: "test-token", ANTHROPIC_API_KEY: "test-secret" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(baseEnv, ["node", "main.js"]);
    expect(config).toMatchObject({
      botToken: "test-token",
      anthropicApiKey: "test-secret",
      anthropicBaseUrl: "https://api.anthropic.com",
      anthropicTimeoutMs: 60_000,
      admins: [],
      allowedUsers: [],
      dataDir: path.resolve("./data"),
      silent: false,
      userDefaults: {
        model: "claude-sonnet-4-20250514",
        heartbeatEnabled: true,
        heartbeatIntervalMinutes: 15,
        maxContextMessages: 50,
      },
    });
  });

  it("requires the bot token and api key", () => {
    expect(() => loadConfig({ ANTHROPIC_API_KEY: "test-secret" }, [])).toThrow("Missing required env var: BOT_TOKEN");
    expect(() => loadConfig({ BOT_TOKEN: "test-token" }, [])).toThrow(ConfigurationError);
  });

  it("adds admins to a non-empty allowlist and drops malformed ids", () => {
    const config = loadConfig({ ...baseEnv, ADMIN_USER_IDS: "9, x", ALLOWED_USER_IDS: "1,2,1" }, []);
    expect(config.admins).toEqual(["9"]);
    expect(config.allowedUsers).toEqual(["1", "2", "9"]);
  });

  it("reads overrides and the silent flag", () => {
    const config = loadConfig(
      { ...baseEnv, DEFAULT_MODEL: "claude-3-5-haiku-20241022", HEARTBEAT_INTERVAL_MINUTES: "30", DATA_DIR: "/tmp/pulse" },
      ["node", "main.js", "--silent"],
    );
    expect(config.userDefaults.model).toBe("claude-3-5-haiku-20241022");
    expect(config.userDefaults.heartbeatIntervalMinutes).toBe(30);
    expect(config.dataDir).toBe("/tmp/pulse");
    expect(config.silent).toBe(true);
  });

  it("rejects an interval that is not a positive integer", () => {
    expect(() => loadConfig({ ...baseEnv, HEARTBEAT_INTERVAL_MINUTES: "0" }, [])).toThrow(
      'HEARTBEAT_INTERVAL_MINUTES must be a positive integer, got "0"',
    );
  });

  it("rejects an interval longer than a year", () => {
    expect(() => loadConfig({ ...baseEnv, HEARTBEAT_INTERVAL_MINUTES: "100000000000000" }, [])).toThrow(
      'HEARTBEAT_INTERVAL_MINUTES must be at most 525600, got "100000000000000"',
    );
  });
});
