import { createLogger, errorMeta } from "../logger.js";
import type { StorageProvider } from "../store/storageManager.js";
import type { Message } from "../store/types.js";
import type { UsageLedger } from "../usage/ledger.js";
import type { ChatTurn, CompletionClient } from "./client.js";
import { buildResponseSystemPrompt, loadSystemPrompt } from "./prompt.js";

const log = createLogger("responder");

const RESPONSE_MAX_TOKENS = 2048;

export interface AssistantResponderDeps {
  client: CompletionClient;
  storage: StorageProvider;
  ledger: Pick<UsageLedger, "record">;
  promptFile: string;
}

/**
 * History as API turns: starts with the user and merges consecutive turns of
 * the same role, as the Messages API expects alternating roles.
 */
export const toChatTurns = (messages: Message[]): ChatTurn[] => {
  const turns: ChatTurn[] = [];
  for (const message of messages) {
    if (turns.length === 0 && message.role === "assistant") continue;
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.content = `${last.content}\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return turns;
};

/** Answers a user message right away, outside the heartbeat. Errors reach the caller. */
export class AssistantResponder {
  constructor(private readonly deps: AssistantResponderDeps) {}

  async respond(userId: string, text: string): Promise<string | null> {
    const store = await this.deps.storage.getUserStorage(userId);
    await store.addMessage("user", text);

    const config = await store.getConfig();
    const [messages, notes, basePrompt] = await Promise.all([
      store.getRecentMessages(config.maxContextMessages),
      store.getNotes(),
      loadSystemPrompt(this.deps.promptFile),
    ]);

    const response = await this.deps.client.complete({
      model: config.model,
      maxTokens: RESPONSE_MAX_TOKENS,
      system: buildResponseSystemPrompt(basePrompt, notes),
      messages: toChatTurns(messages),
    });

    try {
      await this.deps.ledger.record({
        userId,
        model: config.model,
        requestType: "user_response",
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
      });
    } catch (error) {
      log.warn("Failed to record response usage", { userId, ...errorMeta(error) });
    }

    const reply = response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("")
      .trim();
    if (!reply) {
      log.warn("Model returned an empty response", { userId });
      return null;
    }

    await store.addMessage("assistant", reply);
    log.info("Responded to user", { userId, preview: reply.slice(0, 50) });
    return reply;
  }
}
