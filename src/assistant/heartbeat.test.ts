import os from "node:os";
import path from "node:path";

import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import type { ChatTransport } from "../heartbeat/types.js";
import { MemoryUserStorage } from "../testing/memoryStorage.js";
import type { UsageLedger } from "../usage/ledger.js";
import type { CompletionClient, CompletionResponse } from "./client.js";
import { AssistantHeartbeatExecutor, SAVE_NOTE_TOOL, SEND_MESSAGE_TOOL } from "./heartbeat.js";
import { FALLBACK_SYSTEM_PROMPT, HEARTBEAT_INSTRUCTION } from "./prompt.js";

const usage = { inputTokens: 100, outputTokens: 20 };

const sendMessage = (message: string, reasoning = "They asked me to check in."): CompletionResponse => ({
  content: [
    { type: "text", text: reasoning },
    { type: "tool_use", id: "t1", name: "send_message", input: { message } },
  ],
  stopReason: "tool_use",
  usage,
});

describe("AssistantHeartbeatExecutor", () => {
  let complete: Mock<CompletionClient["complete"]>;
  let send: Mock<ChatTransport["send"]>;
  let record: Mock<UsageLedger["record"]>;
  let store: MemoryUserStorage;
  let executor: AssistantHeartbeatExecutor;

  beforeEach(() => {
    complete = vi.fn<CompletionClient["complete"]>(async () => ({ content: [], stopReason: "end_turn", usage }));
    send = vi.fn<ChatTransport["send"]>(async () => undefined);
    record = vi.fn<UsageLedger["record"]>(async (input) => ({
      timestamp: "2025-03-01T09:00:00.000Z",
      ...input,
      inputCost: 0,
      outputCost: 0,
      totalCost: 0,
    }));
    store = new MemoryUserStorage("42", { maxContextMessages: 2 });
    executor = new AssistantHeartbeatExecutor({
      client: { complete },
      transport: { send },
      ledger: { record },
      promptFile: path.join(os.tmpdir(), "pulse-missing-prompt.md"),
    });
  });

  const run = async (dryRun = false) => executor.runHeartbeat("42", store, await store.getConfig(), { dryRun });

  it("sends the context and both tools to the model", async () => {
    await store.addMessage("user", "first");
    await store.addMessage("assistant", "second");
    await store.addMessage("user", "going for a run");
    await store.addNote("ask about the run");

    await run();

    const [request] = complete.mock.calls[0];
    expect(request.model).toBe("claude-sonnet-4-20250514");
    expect(request.messages).toEqual([{ role: "user", content: HEARTBEAT_INSTRUCTION }]);
    expect(request.tools).toEqual([SEND_MESSAGE_TOOL, SAVE_NOTE_TOOL]);
    expect(request.system.startsWith(FALLBACK_SYSTEM_PROMPT)).toBe(true);
    expect(request.system).toContain("] ask about the run");
    expect(request.system).toContain("] user: going for a run");
    expect(request.system).not.toContain("] user: first");
  });

  it("stays silent when the model calls no tool", async () => {
    expect(await run()).toEqual({ toolInvoked: false });
    expect(send).not.toHaveBeenCalled();
    expect(record).toHaveBeenCalledWith({
      userId: "42",
      model: "claude-sonnet-4-20250514",
      requestType: "heartbeat",
      inputTokens: 100,
      outputTokens: 20,
    });
  });

  it("delivers and stores the message the model sends", async () => {
    complete.mockResolvedValueOnce(sendMessage("How was the run?"));

    expect(await run()).toEqual({
      toolInvoked: true,
      message: "How was the run?",
      reasoning: "They asked me to check in.",
    });
    expect(send).toHaveBeenCalledWith("42", "How was the run?");
    expect(store.messages.map((m) => [m.role, m.content])).toEqual([["assistant", "How was the run?"]]);
  });

  it("neither delivers nor stores anything in a dry run", async () => {
    complete.mockResolvedValueOnce({
      ...sendMessage("How was the run?"),
      content: [
        ...sendMessage("How was the run?").content,
        { type: "tool_use", id: "t2", name: "save_note", input: { note: "asked about run" } },
      ],
    });

    const result = await run(true);

    expect(result).toMatchObject({ toolInvoked: true, message: "How was the run?" });
    expect(send).not.toHaveBeenCalled();
    expect(store.messages).toEqual([]);
    expect(store.notes).toEqual([]);
  });

  it("saves notes the model writes", async () => {
    complete.mockResolvedValueOnce({
      content: [{ type: "tool_use", id: "t1", name: "save_note", input: { note: "likes morning runs" } }],
      stopReason: "tool_use",
      usage,
    });

    expect(await run()).toEqual({ toolInvoked: false });
    expect(store.notes.map((n) => n.content)).toEqual(["likes morning runs"]);
  });

  it("reports a delivery failure and does not store the message", async () => {
    complete.mockResolvedValueOnce(sendMessage("Hello?"));
    send.mockRejectedValueOnce(new Error("chat not found"));

    expect(await run()).toEqual({
      toolInvoked: true,
      message: "Hello?",
      reasoning: "They asked me to check in.",
      error: "Delivery failed: chat not found",
    });
    expect(store.messages).toEqual([]);
  });

  it("returns the model error without recording usage", async () => {
    complete.mockRejectedValueOnce(new Error("Model API unavailable: timeout"));

    expect(await run()).toEqual({ toolInvoked: false, error: "Model API unavailable: timeout" });
    expect(record).not.toHaveBeenCalled();
  });

  it("still acts when recording usage fails", async () => {
    complete.mockResolvedValueOnce(sendMessage("Hi"));
    record.mockRejectedValueOnce(new Error("disk full"));

    expect((await run()).toolInvoked).toBe(true);
    expect(send).toHaveBeenCalledTimes(1);
  });
});
