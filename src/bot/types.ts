import type { Context } from "grammy";

import type { AccessPolicy } from "../auth/access.js";
import type { AssistantResponder } from "../assistant/responder.js";
import type { HeartbeatScheduler } from "../heartbeat/scheduler.js";
import type { KeyedQueue } from "../store/lock.js";
import type { StorageManager } from "../store/storageManager.js";
import type { UsageLedger } from "../usage/ledger.js";
import type { UserRegistry } from "../users/registry.js";

export interface BotServices {
  access: AccessPolicy;
  registry: UserRegistry;
  storage: StorageManager;
  scheduler: HeartbeatScheduler;
  responder: AssistantResponder;
  ledger: UsageLedger;
  queue: KeyedQueue;
}

export type BotContext = Context & {
  services: BotServices;
};
