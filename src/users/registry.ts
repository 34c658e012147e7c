import path from "node:path";

import { createLogger } from "../logger.js";
import { STORE_FILES, isValidUserId } from "../store/files.js";
import { JsonDocument, arrayOf } from "../store/jsonDocument.js";
import { Mutex } from "../store/lock.js";
import { isUser } from "../store/schemas.js";
import type { User, UserStatus } from "../store/types.js";

const log = createLogger("registry");

const now = () => new Date().toISOString();

export type UserStatusFilter = UserStatus | "all";

/**
 * Durable catalog of known users. Knows nothing about schedules: callers that
 * change a user's status decide themselves whether the scheduler follows.
 */
export class UserRegistry {
  private readonly lock = new Mutex();
  private readonly document: JsonDocument<User[]>;

  constructor(dataDir: string) {
    this.document = new JsonDocument(path.join(dataDir, STORE_FILES.registry), {
      empty: () => [],
      decode: arrayOf(isUser),
    });
  }

  async init(): Promise<void> {
    await this.lock.run(() => this.document.ensure());
  }

  /** Returns the existing record for `userId`, or creates an active one. */
  async registerUser(userId: string, displayName: string, username?: string): Promise<User> {
    if (!isValidUserId(userId)) {
      throw new Error(`Invalid user id: ${JSON.stringify(userId)}`);
    }
    return this.lock.run(async () => {
      const users = await this.document.read();
      const existing = users.find((user) => user.userId === userId);
      if (existing) return existing;

      const timestamp = now();
      const user: User = {
        userId,
        displayName,
        ...(username ? { username } : {}),
        registeredAt: timestamp,
        lastSeen: timestamp,
        status: "active",
      };
      users.push(user);
      await this.document.write(users);
      log.info("Registered new user", { userId, displayName });
      return user;
    });
  }

  async getUser(userId: string): Promise<User | null> {
    const users = await this.lock.run(() => this.document.read());
    return users.find((user) => user.userId === userId) ?? null;
  }

  async updateLastSeen(userId: string): Promise<void> {
    await this.mutate(userId, "update last seen", (user) => {
      user.lastSeen = now();
    });
  }

  async listUsers(status: UserStatusFilter = "active"): Promise<User[]> {
    const users = await this.lock.run(() => this.document.read());
    return status === "all" ? users : users.filter((user) => user.status === status);
  }

  async deactivateUser(userId: string): Promise<User | null> {
    return this.setStatus(userId, "inactive");
  }

  async activateUser(userId: string): Promise<User | null> {
    return this.setStatus(userId, "active");
  }

  async banUser(userId: string): Promise<User | null> {
    return this.setStatus(userId, "banned");
  }

  private async setStatus(userId: string, status: UserStatus): Promise<User | null> {
    const updated = await this.mutate(userId, `set status ${status}`, (user) => {
      user.status = status;
    });
    if (updated) log.info("User status changed", { userId, status });
    return updated;
  }

  private async mutate(userId: string, action: string, apply: (user: User) => void): Promise<User | null> {
    return this.lock.run(async () => {
      const users = await this.document.read();
      const user = users.find((entry) => entry.userId === userId);
      if (!user) {
        log.warn(`Cannot ${action}: unknown user`, { userId });
        return null;
      }
      apply(user);
      await this.document.write(users);
      return user;
    });
  }
}
