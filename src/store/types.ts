export type UserStatus = "active" | "inactive" | "banned";

export interface User {
  userId: string;
  displayName: string;
  username?: string;
  registeredAt: string;
  lastSeen: string;
  status: UserStatus;
}

export interface UserConfig {
  userId: string;
  model: string;
  heartbeatEnabled: boolean;
  heartbeatIntervalMinutes: number;
  maxContextMessages: number;
  createdAt: string;
  updatedAt: string;
}

/** Fields a caller may change; identity and creation time are not among them. */
export type UserConfigUpdate = Partial<
  Pick<UserConfig, "model" | "heartbeatEnabled" | "heartbeatIntervalMinutes" | "maxContextMessages">
>;

export type MessageRole = "user" | "assistant";

export interface Message {
  timestamp: string;
  role: MessageRole;
  content: string;
}

export interface Note {
  timestamp: string;
  content: string;
}

export type UsageRequestType = "heartbeat" | "user_response";

export interface UsageRecord {
  timestamp: string;
  userId: string;
  model: string;
  requestType: UsageRequestType;
  inputTokens: number;
  outputTokens: number;
  inputCost: number;
  outputCost: number;
  totalCost: number;
}

/** One user's durable state, as handed to the scheduler and executors. */
export interface UserStorage {
  readonly userId: string;
  addMessage(role: MessageRole, content: string): Promise<Message>;
  getRecentMessages(limit?: number): Promise<Message[]>;
  clearMessages(): Promise<void>;
  addNote(content: string): Promise<Note>;
  getNotes(): Promise<Note[]>;
  clearNotes(): Promise<void>;
  getConfig(): Promise<UserConfig>;
  updateConfig(update: UserConfigUpdate): Promise<UserConfig>;
}
