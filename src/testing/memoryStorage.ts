import type { UserDefaults } from "../config.js";
import type { StorageProvider } from "../store/storageManager.js";
import type { Message, MessageRole, Note, UserConfig, UserConfigUpdate, UserStorage } from "../store/types.js";

export const testDefaults: UserDefaults = {
  model: "claude-sonnet-4-20250514",
  heartbeatEnabled: true,
  heartbeatIntervalMinutes: 15,
  maxContextMessages: 50,
};

/** In-process stand-in for a user's files, for tests that run under fake timers. */
export class MemoryUserStorage implements UserStorage {
  readonly messages: Message[] = [];
  readonly notes: Note[] = [];
  config: UserConfig;

  constructor(
    readonly userId: string,
    overrides: UserConfigUpdate = {},
  ) {
    const timestamp = new Date().toISOString();
    this.config = {
      userId,
      ...testDefaults,
      ...overrides,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  async addMessage(role: MessageRole, content: string): Promise<Message> {
    const message: Message = { timestamp: new Date().toISOString(), role, content };
    this.messages.push(message);
    return message;
  }

  async getRecentMessages(limit?: number): Promise<Message[]> {
    if (limit === undefined) return [...this.messages];
    return limit <= 0 ? [] : this.messages.slice(-limit);
  }

  async clearMessages(): Promise<void> {
    this.messages.length = 0;
  }

  async addNote(content: string): Promise<Note> {
    const note: Note = { timestamp: new Date().toISOString(), content };
    this.notes.push(note);
    return note;
  }

  async getNotes(): Promise<Note[]> {
    return [...this.notes];
  }

  async clearNotes(): Promise<void> {
    this.notes.length = 0;
  }

  async getConfig(): Promise<UserConfig> {
    return { ...this.config };
  }

  async updateConfig(update: UserConfigUpdate): Promise<UserConfig> {
    this.config = { ...this.config, ...update, updatedAt: new Date().toISOString() };
    return { ...this.config };
  }
}

export class MemoryStorageProvider implements StorageProvider {
  readonly stores = new Map<string, MemoryUserStorage>();

  add(store: MemoryUserStorage): MemoryUserStorage {
    this.stores.set(store.userId, store);
    return store;
  }

  async getUserStorage(userId: string): Promise<MemoryUserStorage> {
    return this.stores.get(userId) ?? this.add(new MemoryUserStorage(userId));
  }
}
