import { describeError } from "../errors.js";
import type { ChatTransport, HeartbeatExecutor, HeartbeatResult, HeartbeatRunOptions } from "../heartbeat/types.js";
import { createLogger, errorMeta } from "../logger.js";
import type { UserConfig, UserStorage } from "../store/types.js";
import type { UsageLedger } from "../usage/ledger.js";
import type { CompletionClient, CompletionResponse, ToolDefinition } from "./client.js";
import { HEARTBEAT_INSTRUCTION, buildHeartbeatSystemPrompt, loadSystemPrompt } from "./prompt.js";

const log = createLogger("heartbeat-executor");

const HEARTBEAT_MAX_TOKENS = 1024;

export const SEND_MESSAGE_TOOL: ToolDefinition = {
  name: "send_message",
  description:
    "Send a message to the user via Telegram. Use this to check in, ask how they are doing, offer help, or gently prompt. You may also choose NOT to call this tool if silence is more appropriate (e.g. the user just said they are going for a run).",
  input_schema: {
    type: "object",
    properties: {
      message: { type: "string", description: "The message to send" },
    },
    required: ["message"],
  },
};

export const SAVE_NOTE_TOOL: ToolDefinition = {
  name: "save_note",
  description:
    "Save a short private note to your scratchpad for future heartbeats, such as something to follow up on later. The user does not see notes.",
  input_schema: {
    type: "object",
    properties: {
      note: { type: "string", description: "The note to remember" },
    },
    required: ["note"],
  },
};

export interface AssistantHeartbeatDeps {
  client: CompletionClient;
  transport: ChatTransport;
  ledger: Pick<UsageLedger, "record">;
  promptFile: string;
}

const textInput = (input: Record<string, unknown>, key: string): string | null => {
  const value = input[key];
  return typeof value === "string" && value.trim() ? value.trim() : null;
};

/** Asks the model whether to reach out, and acts on the tools it calls. */
export class AssistantHeartbeatExecutor implements HeartbeatExecutor {
  constructor(private readonly deps: AssistantHeartbeatDeps) {}

  async runHeartbeat(
    userId: string,
    store: UserStorage,
    config: UserConfig,
    options: HeartbeatRunOptions = {},
  ): Promise<HeartbeatResult> {
    const dryRun = options.dryRun ?? false;
    const [messages, notes, basePrompt] = await Promise.all([
      store.getRecentMessages(config.maxContextMessages),
      store.getNotes(),
      loadSystemPrompt(this.deps.promptFile),
    ]);

    let response: CompletionResponse;
    try {
      response = await this.deps.client.complete({
        model: config.model,
        maxTokens: HEARTBEAT_MAX_TOKENS,
        system: buildHeartbeatSystemPrompt(basePrompt, notes, messages),
        messages: [{ role: "user", content: HEARTBEAT_INSTRUCTION }],
        tools: [SEND_MESSAGE_TOOL, SAVE_NOTE_TOOL],
      });
    } catch (error) {
      log.error("Heartbeat model call failed", { userId, ...errorMeta(error) });
      return { toolInvoked: false, error: describeError(error) };
    }

    await this.recordUsage(userId, config.model, response);

    const result: HeartbeatResult = { toolInvoked: false };
    const reasoning = response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("\n")
      .trim();
    if (reasoning) {
      result.reasoning = reasoning;
      log.debug("Heartbeat reasoning", { userId, reasoning });
    }

    for (const block of response.content) {
      if (block.type !== "tool_use") continue;

      if (block.name === SEND_MESSAGE_TOOL.name) {
        const message = textInput(block.input, "message");
        if (!message) {
          log.warn("send_message called without text", { userId });
          continue;
        }
        result.toolInvoked = true;
        result.message = message;
        log.info("Heartbeat decided to send a message", { userId, preview: message.slice(0, 50), dryRun });
        if (!dryRun) {
          const error = await this.deliver(userId, store, message);
          if (error) result.error = error;
        }
      } else if (block.name === SAVE_NOTE_TOOL.name) {
        const note = textInput(block.input, "note");
        if (note && !dryRun) {
          await store.addNote(note);
          log.info("Heartbeat saved a note", { userId });
        }
      } else {
        log.warn("Model called an unknown tool", { userId, tool: block.name });
      }
    }

    if (!result.toolInvoked) {
      log.info("Heartbeat chose silence", { userId });
    }
    return result;
  }

  private async deliver(userId: string, store: UserStorage, message: string): Promise<string | null> {
    try {
      await this.deps.transport.send(userId, message);
    } catch (error) {
      log.error("Heartbeat delivery failed", { userId, ...errorMeta(error) });
      return `Delivery failed: ${describeError(error)}`;
    }
    await store.addMessage("assistant", message);
    return null;
  }

  private async recordUsage(userId: string, model: string, response: CompletionResponse): Promise<void> {
    try {
      await this.deps.ledger.record({
        userId,
        model,
        requestType: "heartbeat",
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
      });
    } catch (error) {
      log.warn("Failed to record heartbeat usage", { userId, ...errorMeta(error) });
    }
  }
}
