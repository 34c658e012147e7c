import { ConfigurationError, describeError } from "../errors.js";
import { createLogger, errorMeta } from "../logger.js";
import { MAX_INTERVAL_MINUTES, isHeartbeatInterval } from "../store/schemas.js";
import type { StorageProvider } from "../store/storageManager.js";
import type { UserRegistry } from "../users/registry.js";
import { TimerEngine } from "./timerEngine.js";
import type { HeartbeatExecutor, HeartbeatResult, HeartbeatRunOptions, HeartbeatStatus } from "./types.js";

const log = createLogger("heartbeat");

const MINUTE_MS = 60_000;

export interface HeartbeatSchedulerDeps {
  registry: Pick<UserRegistry, "listUsers">;
  storage: StorageProvider;
  executor: HeartbeatExecutor;
  engine?: TimerEngine;
}

/**
 * One recurring heartbeat per user. Whether a user's heartbeat is enabled is
 * tracked apart from its timer: pausing leaves the cadence alone and turns the
 * following ticks into no-ops.
 */
export class HeartbeatScheduler {
  private readonly registry: HeartbeatSchedulerDeps["registry"];
  private readonly storage: StorageProvider;
  private readonly executor: HeartbeatExecutor;
  private readonly engine: TimerEngine;
  private readonly enabled = new Map<string, boolean>();

  constructor(deps: HeartbeatSchedulerDeps) {
    this.registry = deps.registry;
    this.storage = deps.storage;
    this.executor = deps.executor;
    this.engine = deps.engine ?? new TimerEngine();
  }

  addUser(userId: string, intervalMinutes: number, enabled: boolean): Date {
    if (!isHeartbeatInterval(intervalMinutes)) {
      throw new ConfigurationError(
        `Heartbeat interval must be a whole number from 1 to ${MAX_INTERVAL_MINUTES} minutes, got ${intervalMinutes}`,
      );
    }
    const nextRunAt = this.engine.schedule(userId, intervalMinutes * MINUTE_MS, () => this.tick(userId));
    this.enabled.set(userId, enabled);
    log.info("Heartbeat scheduled", {
      userId,
      intervalMinutes,
      enabled,
      nextRunAt: this.engine.isStarted() ? nextRunAt.toISOString() : null,
    });
    return nextRunAt;
  }

  removeUser(userId: string): void {
    const removed = this.engine.cancel(userId);
    this.enabled.delete(userId);
    if (removed) log.info("Heartbeat removed", { userId });
  }

  pauseUser(userId: string): boolean {
    return this.setEnabled(userId, false);
  }

  resumeUser(userId: string): boolean {
    return this.setEnabled(userId, true);
  }

  /** Users the scheduler has never seen count as enabled. */
  isEnabled(userId: string): boolean {
    return this.enabled.get(userId) ?? true;
  }

  getStatus(userId: string): HeartbeatStatus {
    return {
      enabled: this.isEnabled(userId),
      nextScheduledTime: this.engine.nextRunAt(userId),
      jobExists: this.engine.has(userId),
      running: this.engine.isRunning(userId),
    };
  }

  listUsers(): string[] {
    return this.engine.keys();
  }

  async start(): Promise<void> {
    log.info("Starting heartbeat scheduler");
    const users = await this.registry.listUsers("active");

    let scheduled = 0;
    for (const user of users) {
      try {
        const store = await this.storage.getUserStorage(user.userId);
        const config = await store.getConfig();
        this.addUser(user.userId, config.heartbeatIntervalMinutes, config.heartbeatEnabled);
        scheduled += 1;
      } catch (error) {
        log.error("Failed to schedule user at startup", { userId: user.userId, ...errorMeta(error) });
      }
    }

    this.engine.start();
    log.info("Heartbeat scheduler started", { users: scheduled });
  }

  stop(): void {
    log.info("Stopping heartbeat scheduler");
    this.engine.shutdown();
    this.enabled.clear();
  }

  /** Waits for heartbeats already running when the scheduler stopped. */
  async drain(): Promise<void> {
    await this.engine.drain();
  }

  /**
   * One heartbeat outside the schedule, ignoring the enabled flag. Returns null
   * when a heartbeat for this user is already running.
   */
  async triggerNow(userId: string, options: HeartbeatRunOptions = {}): Promise<HeartbeatResult | null> {
    const run = this.engine.runExclusive(userId, () => this.execute(userId, options));
    if (!run) {
      log.warn("Manual heartbeat skipped, one is already running", { userId });
      return null;
    }
    log.info("Manual heartbeat triggered", { userId, dryRun: options.dryRun ?? false });
    return run;
  }

  private setEnabled(userId: string, value: boolean): boolean {
    if (!this.enabled.has(userId) && !this.engine.has(userId)) {
      log.warn("Cannot change heartbeat state: user not scheduled", { userId, enabled: value });
      return false;
    }
    this.enabled.set(userId, value);
    log.info(value ? "Heartbeat resumed" : "Heartbeat paused", { userId });
    return true;
  }

  private async tick(userId: string): Promise<void> {
    log.info("Heartbeat triggered", { userId });
    if (!this.isEnabled(userId)) {
      log.info("Heartbeat disabled, skipping", { userId });
      return;
    }
    await this.execute(userId, {});
  }

  // Nothing thrown in here reaches the timer engine or other users.
  private async execute(userId: string, options: HeartbeatRunOptions): Promise<HeartbeatResult> {
    const startedAt = Date.now();
    try {
      const store = await this.storage.getUserStorage(userId);
      const config = await store.getConfig();
      const result = await this.executor.runHeartbeat(userId, store, config, options);
      if (result.error) {
        log.warn("Heartbeat finished with error", { userId, error: result.error });
      } else {
        log.info("Heartbeat completed", {
          userId,
          toolInvoked: result.toolInvoked,
          durationMs: Date.now() - startedAt,
        });
      }
      return result;
    } catch (error) {
      log.error("Heartbeat failed", { userId, ...errorMeta(error) });
      return { toolInvoked: false, error: describeError(error) };
    }
  }
}
