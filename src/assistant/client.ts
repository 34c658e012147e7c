import { AssistantApiError, AssistantExecutionError, describeError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("assistant-client");

const API_VERSION = "2023-06-01";

export interface AssistantClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> };

export interface CompletionRequest {
  model: string;
  maxTokens: number;
  system: string;
  messages: ChatTurn[];
  tools?: ToolDefinition[];
}

export interface CompletionResponse {
  content: ContentBlock[];
  stopReason: string | null;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** The slice of a model backend the executor and responder depend on. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const decodeBlock = (value: unknown): ContentBlock | null => {
  if (!isRecord(value)) return null;
  if (value.type === "text" && typeof value.text === "string") {
    return { type: "text", text: value.text };
  }
  if (
    value.type === "tool_use" &&
    typeof value.id === "string" &&
    typeof value.name === "string" &&
    isRecord(value.input)
  ) {
    return { type: "tool_use", id: value.id, name: value.name, input: value.input };
  }
  return null;
};

const tokenCount = (value: unknown): number => (typeof value === "number" && Number.isFinite(value) ? value : 0);

export const decodeCompletion = (payload: unknown): CompletionResponse => {
  if (!isRecord(payload) || !Array.isArray(payload.content)) {
    throw new AssistantExecutionError("Model response has no content");
  }
  const usage = isRecord(payload.usage) ? payload.usage : {};
  return {
    content: payload.content.map(decodeBlock).filter((block): block is ContentBlock => block !== null),
    stopReason: typeof payload.stop_reason === "string" ? payload.stop_reason : null,
    usage: {
      inputTokens: tokenCount(usage.input_tokens),
      outputTokens: tokenCount(usage.output_tokens),
    },
  };
};

/** Messages API client over fetch. */
export class AnthropicClient implements CompletionClient {
  constructor(private readonly options: AssistantClientOptions) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const body = {
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: request.messages,
      ...(request.tools && request.tools.length > 0 ? { tools: request.tools } : {}),
    };
    log.debug("Sending completion request", {
      model: request.model,
      messages: request.messages.length,
      tools: request.tools?.map((tool) => tool.name) ?? [],
    });
    const payload = await this.requestJson("/v1/messages", body);
    return decodeCompletion(payload);
  }

  private async requestJson(path: string, body: unknown): Promise<unknown> {
    const url = new URL(path, this.options.baseUrl);
    const headers = new Headers({
      Accept: "application/json",
      "Content-Type": "application/json",
      "x-api-key": this.options.apiKey,
      "anthropic-version": API_VERSION,
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      const raw = await response.text();
      if (!response.ok) {
        throw new AssistantApiError(raw.trim() || `Model API error (${response.status})`, response.status);
      }
      try {
        return JSON.parse(raw);
      } catch (error) {
        throw new AssistantExecutionError(`Model API returned invalid JSON: ${describeError(error)}`);
      }
    } catch (error) {
      if (error instanceof AssistantExecutionError) {
        throw error;
      }
      throw new AssistantExecutionError(`Model API unavailable: ${describeError(error)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
