import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";

import { createLogger } from "../logger.js";
import { Mutex } from "../store/lock.js";
import { isUsageRecord } from "../store/schemas.js";
import type { UsageRecord, UsageRequestType } from "../store/types.js";
import { calculateCost } from "./pricing.js";

const log = createLogger("usage");

const DAY_MS = 24 * 60 * 60 * 1000;

export interface UsageInput {
  userId: string;
  model: string;
  requestType: UsageRequestType;
  inputTokens: number;
  outputTokens: number;
}

export interface UsageStats {
  totalCost: number;
  totalTokens: number;
  inputTokens: number;
  outputTokens: number;
  requestCount: number;
}

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

const formatUsd = (value: number): string => `$${value.toFixed(4)}`;

const formatCount = (value: number): string => value.toLocaleString("en-US");

/** Append-only JSONL record of model calls and their cost. */
export class UsageLedger {
  private readonly lock = new Mutex();

  constructor(private readonly filePath: string) {}

  async record(input: UsageInput): Promise<UsageRecord> {
    const record: UsageRecord = {
      timestamp: new Date().toISOString(),
      ...input,
      ...calculateCost(input.model, input.inputTokens, input.outputTokens),
    };
    await this.lock.run(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
    });
    log.info("Model usage recorded", {
      userId: record.userId,
      requestType: record.requestType,
      inputTokens: record.inputTokens,
      outputTokens: record.outputTokens,
      totalCost: record.totalCost,
    });
    return record;
  }

  async readAll(): Promise<UsageRecord[]> {
    let raw: string;
    try {
      raw = await this.lock.run(() => readFile(this.filePath, "utf8"));
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }
    const records: UsageRecord[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isUsageRecord(parsed)) records.push(parsed);
      } catch {
        log.debug("Skipping unreadable usage line", { file: this.filePath });
      }
    }
    return records;
  }

  /** Totals over the last `days` days, optionally for one user. */
  async getStats(days: number, userId?: string, now: Date = new Date()): Promise<UsageStats> {
    const cutoff = now.getTime() - days * DAY_MS;
    const stats: UsageStats = { totalCost: 0, totalTokens: 0, inputTokens: 0, outputTokens: 0, requestCount: 0 };
    for (const record of await this.readAll()) {
      if (userId !== undefined && record.userId !== userId) continue;
      const at = Date.parse(record.timestamp);
      if (!Number.isFinite(at) || at < cutoff) continue;
      stats.inputTokens += record.inputTokens;
      stats.outputTokens += record.outputTokens;
      stats.totalCost += record.totalCost;
      stats.requestCount += 1;
    }
    stats.totalTokens = stats.inputTokens + stats.outputTokens;
    stats.totalCost = round4(stats.totalCost);
    return stats;
  }

  async formatReport(userId: string, model: string, now: Date = new Date()): Promise<string> {
    const [today, week, month] = await Promise.all([
      this.getStats(1, userId, now),
      this.getStats(7, userId, now),
      this.getStats(30, userId, now),
    ]);

    const lines = ["Status Report", "", `Model: ${model}`, "", "API costs:"];
    if (month.requestCount === 0) {
      lines.push("No API usage recorded yet");
      return lines.join("\n");
    }
    lines.push(
      `Today:      ${formatUsd(today.totalCost)} (${today.requestCount} requests)`,
      `This week:  ${formatUsd(week.totalCost)} (${week.requestCount} requests)`,
      `This month: ${formatUsd(month.totalCost)} (${month.requestCount} requests)`,
      "",
      "Usage today:",
      `Total tokens: ${formatCount(today.totalTokens)} (${formatCount(today.inputTokens)} in, ${formatCount(today.outputTokens)} out)`,
    );
    return lines.join("\n");
  }
}
