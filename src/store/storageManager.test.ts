import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { UserDefaults } from "../config.js";
import { StorageManager } from "./storageManager.js";

const defaults: UserDefaults = {
  model: "claude-sonnet-4-20250514",
  heartbeatEnabled: true,
  heartbeatIntervalMinutes: 15,
  maxContextMessages: 50,
};

describe("StorageManager", () => {
  let dir: string;
  let manager: StorageManager;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "storage-manager-"));
    manager = new StorageManager(dir, defaults);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("hands out the same store to concurrent first callers", async () => {
    const stores = await Promise.all(Array.from({ length: 5 }, () => manager.getUserStorage("42")));
    expect(new Set(stores).size).toBe(1);
    expect(manager.knownUserIds()).toEqual(["42"]);
  });

  it("loses no message when callers write through separately fetched handles", async () => {
    await Promise.all(
      Array.from({ length: 10 }, async (_, i) => {
        const store = await manager.getUserStorage("42");
        await store.addMessage("user", `m${i}`);
      }),
    );

    const store = await manager.getUserStorage("42");
    expect(await store.getRecentMessages()).toHaveLength(10);
  });

  it("keeps users in separate directories", async () => {
    const alice = await manager.getUserStorage("1");
    const bob = await manager.getUserStorage("2");
    await alice.addNote("alice only");

    expect(alice).not.toBe(bob);
    expect(await bob.getNotes()).toEqual([]);
    await expect(fs.stat(path.join(dir, "users", "1", "notes.json"))).resolves.toBeTruthy();
  });

  it("rejects ids that would escape the data directory", async () => {
    await expect(manager.getUserStorage("../evil")).rejects.toThrow("Invalid user id");
    expect(manager.knownUserIds()).toEqual([]);
  });
});
