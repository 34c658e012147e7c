import { describe, expect, it } from "vitest";

import type { UserConfig } from "../store/types.js";
import { formatHeartbeatResult, formatHeartbeatStatus, formatNotes, formatUserList, parseHeartbeatCommand } from "./commands.js";

const config: UserConfig = {
  userId: "42",
  model: "claude-sonnet-4-20250514",
  heartbeatEnabled: true,
  heartbeatIntervalMinutes: 15,
  maxContextMessages: 50,
  createdAt: "2025-03-01T09:00:00.000Z",
  updatedAt: "2025-03-01T09:00:00.000Z",
};

describe("parseHeartbeatCommand", () => {
  it("defaults to status", () => {
    expect(parseHeartbeatCommand("")).toEqual({ action: "status" });
    expect(parseHeartbeatCommand("  STATUS ")).toEqual({ action: "status" });
  });

  it("reads the simple actions", () => {
    expect(parseHeartbeatCommand("on")).toEqual({ action: "on" });
    expect(parseHeartbeatCommand("off")).toEqual({ action: "off" });
    expect(parseHeartbeatCommand("now")).toEqual({ action: "now" });
    expect(parseHeartbeatCommand("debug")).toEqual({ action: "debug" });
  });

  it("reads a whole-minute interval", () => {
    expect(parseHeartbeatCommand("interval 30")).toEqual({ action: "interval", minutes: 30 });
  });

  it("rejects a missing, fractional or oversized interval", () => {
    const usage = "Usage: /heartbeat interval <minutes> (a whole number from 1 to 525600)";
    expect(parseHeartbeatCommand("interval")).toEqual({ action: "invalid", reason: usage });
    expect(parseHeartbeatCommand("interval 0")).toEqual({ action: "invalid", reason: usage });
    expect(parseHeartbeatCommand("interval 2.5")).toEqual({ action: "invalid", reason: usage });
    expect(parseHeartbeatCommand("interval 100000000000000")).toEqual({ action: "invalid", reason: usage });
    expect(parseHeartbeatCommand("interval 525601")).toEqual({ action: "invalid", reason: usage });
    expect(parseHeartbeatCommand("interval 525600")).toEqual({ action: "interval", minutes: 525_600 });
  });

  it("rejects unknown actions", () => {
    expect(parseHeartbeatCommand("sometimes")).toEqual({
      action: "invalid",
      reason: "Usage: /heartbeat [status|on|off|interval <minutes>|now|debug]",
    });
  });
});

describe("formatHeartbeatStatus", () => {
  it("shows the next run of a scheduled user", () => {
    expect(
      formatHeartbeatStatus(
        {
          enabled: true,
          nextScheduledTime: new Date("2025-03-01T09:15:00.000Z"),
          jobExists: true,
          running: true,
        },
        config,
      ),
    ).toBe(
      "Heartbeat: on\nInterval: every 15 min\nNext check: 2025-03-01T09:15:00.000Z\nA check is running right now.",
    );
  });

  it("says when nothing is scheduled", () => {
    expect(
      formatHeartbeatStatus({ enabled: false, nextScheduledTime: null, jobExists: false, running: false }, config),
    ).toBe("Heartbeat: paused\nInterval: every 15 min\nNext check: not scheduled");
  });
});

describe("formatHeartbeatResult", () => {
  it("explains a refused run", () => {
    expect(formatHeartbeatResult(null, false)).toBe("A heartbeat is already running, try again in a moment.");
  });

  it("shows the failure of a run that did nothing", () => {
    expect(formatHeartbeatResult({ toolInvoked: false, error: "timeout" }, false)).toBe("Heartbeat failed: timeout");
  });

  it("shows the decision and reasoning of a dry run", () => {
    expect(
      formatHeartbeatResult({ toolInvoked: true, message: "How was the run?", reasoning: "They ran." }, true),
    ).toBe("Heartbeat dry run\n\nDecision: send message (not delivered)\nHow was the run?\n\nReasoning:\nThey ran.");
  });

  it("shows silence for a live run", () => {
    expect(formatHeartbeatResult({ toolInvoked: false, reasoning: "Too soon." }, false)).toBe(
      "Heartbeat done\n\nDecision: stay silent",
    );
  });
});

describe("formatNotes", () => {
  it("numbers the notes", () => {
    expect(
      formatNotes([
        { timestamp: "t1", content: "first" },
        { timestamp: "t2", content: "second" },
      ]),
    ).toBe("1. [t1] first\n2. [t2] second");
    expect(formatNotes([])).toBe("No notes yet.");
  });
});

describe("formatUserList", () => {
  it("lists users with their schedule state", () => {
    expect(
      formatUserList(
        [
          {
            userId: "42",
            displayName: "Ada",
            username: "ada",
            registeredAt: "t0",
            lastSeen: "t1",
            status: "active",
          },
          { userId: "7", displayName: "Bob", registeredAt: "t0", lastSeen: "t2", status: "inactive" },
        ],
        new Set(["42"]),
      ),
    ).toBe("42 Ada (@ada) · active · scheduled · last seen t1\n7 Bob · inactive · no heartbeat · last seen t2");
  });
});
