import { createLogger, errorMeta } from "../logger.js";

const log = createLogger("timer-engine");

// Node's setTimeout overflows past this and fires immediately.
const MAX_TIMEOUT_MS = 2_147_483_647;
// Largest timestamp a Date can hold.
const MAX_DATE_MS = 8.64e15;

type JobTask = () => Promise<unknown>;

interface IntervalJob {
  key: string;
  intervalMs: number;
  nextRunAt: number;
  timer: ReturnType<typeof setTimeout> | null;
  task: JobTask;
}

/**
 * Fixed-cadence jobs, one per key. Occurrences land at `armedAt + k * interval`.
 * The next occurrence is armed before a run starts, and an occurrence that finds
 * the previous run of the same key still going is dropped rather than queued.
 */
export class TimerEngine {
  private readonly jobs = new Map<string, IntervalJob>();
  private readonly busy = new Set<string>();
  private readonly inFlight = new Set<Promise<void>>();
  private started = false;

  /** Registers or replaces the job for `key`; returns its first fire time. */
  schedule(key: string, intervalMs: number, task: JobTask): Date {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Interval must be positive, got ${intervalMs}`);
    }
    if (Date.now() + intervalMs > MAX_DATE_MS) {
      throw new RangeError(`Interval of ${intervalMs} ms runs past the last representable date`);
    }
    this.cancel(key);
    const job: IntervalJob = {
      key,
      intervalMs,
      nextRunAt: Date.now() + intervalMs,
      timer: null,
      task,
    };
    this.jobs.set(key, job);
    if (this.started) this.arm(job);
    return new Date(job.nextRunAt);
  }

  cancel(key: string): boolean {
    const job = this.jobs.get(key);
    if (!job) return false;
    if (job.timer) clearTimeout(job.timer);
    job.timer = null;
    this.jobs.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.jobs.has(key);
  }

  keys(): string[] {
    return [...this.jobs.keys()];
  }

  nextRunAt(key: string): Date | null {
    const job = this.jobs.get(key);
    return job ? new Date(job.nextRunAt) : null;
  }

  isRunning(key: string): boolean {
    return this.busy.has(key);
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Runs `task` under the same per-key exclusion as scheduled runs, without
   * touching the cadence. Returns null when a run for `key` is in progress.
   */
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> | null {
    if (this.busy.has(key)) return null;
    return this.execute(key, task);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    const now = Date.now();
    for (const job of this.jobs.values()) {
      if (job.nextRunAt <= now) job.nextRunAt = this.followingRun(job, now);
      this.arm(job);
    }
  }

  /** Cancels every timer. Runs already started are left to finish. */
  shutdown(): void {
    for (const key of this.keys()) this.cancel(key);
    this.started = false;
  }

  /** Resolves once every run in progress has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private arm(job: IntervalJob): void {
    const delay = Math.max(0, job.nextRunAt - Date.now());
    if (delay > MAX_TIMEOUT_MS) {
      job.timer = setTimeout(() => {
        if (this.jobs.get(job.key) === job) this.arm(job);
      }, MAX_TIMEOUT_MS);
      return;
    }
    job.timer = setTimeout(() => this.fire(job), delay);
  }

  private fire(job: IntervalJob): void {
    if (this.jobs.get(job.key) !== job) return;
    const scheduledFor = job.nextRunAt;
    job.nextRunAt = this.followingRun(job, Date.now());
    this.arm(job);

    if (this.busy.has(job.key)) {
      log.warn("Previous run still in progress, dropping occurrence", {
        key: job.key,
        scheduledFor: new Date(scheduledFor).toISOString(),
        nextRunAt: new Date(job.nextRunAt).toISOString(),
      });
      return;
    }
    // failures are logged by execute
    void this.execute(job.key, job.task);
  }

  private followingRun(job: IntervalJob, now: number): number {
    let next = job.nextRunAt + job.intervalMs;
    while (next <= now) next += job.intervalMs;
    return next;
  }

  private execute<T>(key: string, task: () => Promise<T>): Promise<T> {
    this.busy.add(key);
    const run = (async () => {
      try {
        return await task();
      } finally {
        this.busy.delete(key);
      }
    })();

    const tracked = run.then(
      () => undefined,
      (error: unknown) => {
        log.error("Job run failed", { key, ...errorMeta(error) });
      },
    );
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
    return run;
  }
}
