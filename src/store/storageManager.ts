import path from "node:path";

import type { UserDefaults } from "../config.js";
import { createLogger, errorMeta } from "../logger.js";
import { STORE_FILES, isValidUserId } from "./files.js";
import type { UserStorage } from "./types.js";
import { UserStore } from "./userStore.js";

const log = createLogger("storage");

/** What the scheduler and executors need from storage. */
export interface StorageProvider {
  getUserStorage(userId: string): Promise<UserStorage>;
}

/**
 * Hands out exactly one {@link UserStore} per user id for the lifetime of the
 * process. The cache holds the pending creation, set synchronously, so callers
 * racing on a never-seen id all await the same store.
 */
export class StorageManager implements StorageProvider {
  private readonly handles = new Map<string, Promise<UserStore>>();

  constructor(
    private readonly dataDir: string,
    private readonly defaults: UserDefaults,
  ) {}

  getUserStorage(userId: string): Promise<UserStore> {
    const cached = this.handles.get(userId);
    if (cached) return cached;

    if (!isValidUserId(userId)) {
      return Promise.reject(new Error(`Invalid user id: ${JSON.stringify(userId)}`));
    }

    const created = this.create(userId);
    this.handles.set(userId, created);
    void created.catch((error: unknown) => {
      if (this.handles.get(userId) === created) {
        this.handles.delete(userId);
      }
      log.error("Failed to initialize user storage", { userId, ...errorMeta(error) });
    });
    return created;
  }

  knownUserIds(): string[] {
    return [...this.handles.keys()];
  }

  private async create(userId: string): Promise<UserStore> {
    const directory = path.join(this.dataDir, STORE_FILES.usersDir, userId);
    const store = new UserStore(userId, directory, this.defaults);
    await store.init();
    log.info("User storage ready", { userId, directory });
    return store;
  }
}
