import path from "node:path";

import type { UserDefaults } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { USER_FILES } from "./files.js";
import { JsonDocument, arrayOf } from "./jsonDocument.js";
import { Mutex } from "./lock.js";
import {
  MAX_INTERVAL_MINUTES,
  isHeartbeatInterval,
  isMessage,
  isNote,
  isPositiveInteger,
  parseUserConfig,
} from "./schemas.js";
import type { Message, MessageRole, Note, UserConfig, UserConfigUpdate, UserStorage } from "./types.js";

const log = createLogger("user-store");

const now = () => new Date().toISOString();

const validateUpdate = (update: UserConfigUpdate): void => {
  if (update.heartbeatIntervalMinutes !== undefined && !isHeartbeatInterval(update.heartbeatIntervalMinutes)) {
    throw new ConfigurationError(`heartbeatIntervalMinutes must be a whole number from 1 to ${MAX_INTERVAL_MINUTES}`);
  }
  if (update.maxContextMessages !== undefined && !isPositiveInteger(update.maxContextMessages)) {
    throw new ConfigurationError("maxContextMessages must be a positive integer");
  }
  if (update.model !== undefined && update.model.trim() === "") {
    throw new ConfigurationError("model must not be empty");
  }
};

/**
 * Durable state of one user: message log, note log and configuration. Every
 * access runs inside this user's mutex, so a read-modify-write never interleaves
 * with another operation on the same user.
 */
export class UserStore implements UserStorage {
  private readonly lock = new Mutex();
  private readonly messages: JsonDocument<Message[]>;
  private readonly notes: JsonDocument<Note[]>;
  private readonly config: JsonDocument<unknown>;

  constructor(
    readonly userId: string,
    readonly directory: string,
    private readonly defaults: UserDefaults,
  ) {
    this.messages = new JsonDocument(path.join(directory, USER_FILES.messages), {
      empty: () => [],
      decode: arrayOf(isMessage),
    });
    this.notes = new JsonDocument(path.join(directory, USER_FILES.notes), {
      empty: () => [],
      decode: arrayOf(isNote),
    });
    this.config = new JsonDocument<unknown>(path.join(directory, USER_FILES.config), {
      empty: () => ({}),
      decode: (value) => value,
    });
  }

  /** Creates missing files, including a default config. */
  async init(): Promise<void> {
    await this.lock.run(async () => {
      await Promise.all([this.messages.ensure(), this.notes.ensure(), this.config.ensure()]);
      await this.loadConfig();
    });
  }

  async addMessage(role: MessageRole, content: string): Promise<Message> {
    const entry: Message = { timestamp: now(), role, content };
    await this.lock.run(async () => {
      const messages = await this.messages.read();
      messages.push(entry);
      await this.messages.write(messages);
    });
    return entry;
  }

  /** The last `limit` messages in chronological order, or all of them without a limit. */
  async getRecentMessages(limit?: number): Promise<Message[]> {
    const messages = await this.lock.run(() => this.messages.read());
    if (limit === undefined) return messages;
    if (limit <= 0) return [];
    return messages.slice(-limit);
  }

  async clearMessages(): Promise<void> {
    await this.lock.run(() => this.messages.write([]));
  }

  async addNote(content: string): Promise<Note> {
    const entry: Note = { timestamp: now(), content };
    await this.lock.run(async () => {
      const notes = await this.notes.read();
      notes.push(entry);
      await this.notes.write(notes);
    });
    return entry;
  }

  async getNotes(): Promise<Note[]> {
    return this.lock.run(() => this.notes.read());
  }

  async clearNotes(): Promise<void> {
    await this.lock.run(() => this.notes.write([]));
  }

  async getConfig(): Promise<UserConfig> {
    return this.lock.run(() => this.loadConfig());
  }

  async updateConfig(update: UserConfigUpdate): Promise<UserConfig> {
    validateUpdate(update);
    return this.lock.run(async () => {
      const current = await this.loadConfig();
      const next: UserConfig = {
        ...current,
        ...(update.model !== undefined ? { model: update.model } : {}),
        ...(update.heartbeatEnabled !== undefined ? { heartbeatEnabled: update.heartbeatEnabled } : {}),
        ...(update.heartbeatIntervalMinutes !== undefined
          ? { heartbeatIntervalMinutes: update.heartbeatIntervalMinutes }
          : {}),
        ...(update.maxContextMessages !== undefined ? { maxContextMessages: update.maxContextMessages } : {}),
        updatedAt: now(),
      };
      await this.config.write(next);
      log.debug("User config updated", { userId: this.userId, fields: Object.keys(update) });
      return next;
    });
  }

  // Must be called with the lock held.
  private async loadConfig(): Promise<UserConfig> {
    const raw = await this.config.read();
    const { config, repairedFields } = parseUserConfig(raw, this.userId, this.defaults, now());
    if (repairedFields.length > 0) {
      const fresh = typeof raw === "object" && raw !== null && Object.keys(raw).length === 0;
      if (!fresh) {
        log.warn("User config had invalid fields, falling back to defaults", {
          userId: this.userId,
          fields: repairedFields,
        });
      }
      await this.config.write(config);
    }
    return config;
  }
}
