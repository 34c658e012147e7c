import type { UserConfig, UserStorage } from "../store/types.js";

export interface HeartbeatResult {
  toolInvoked: boolean;
  message?: string;
  reasoning?: string;
  error?: string;
}

export interface HeartbeatRunOptions {
  /** Decide, but neither deliver nor persist anything. */
  dryRun?: boolean;
}

export interface HeartbeatExecutor {
  runHeartbeat(
    userId: string,
    store: UserStorage,
    config: UserConfig,
    options?: HeartbeatRunOptions,
  ): Promise<HeartbeatResult>;
}

export interface ChatTransport {
  send(userId: string, text: string): Promise<void>;
}

export interface HeartbeatStatus {
  enabled: boolean;
  nextScheduledTime: Date | null;
  jobExists: boolean;
  running: boolean;
}
