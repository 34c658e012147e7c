import { readFile } from "node:fs/promises";

import { createLogger } from "../logger.js";
import type { Message, Note } from "../store/types.js";

const log = createLogger("prompt");

export const NOTES_IN_CONTEXT = 10;

export const FALLBACK_SYSTEM_PROMPT = `You are Pulse, a proactive companion that checks in with the user from time to time.

You run on a heartbeat. On each beat you can read the conversation so far and your own notes, and you decide whether to send a message or stay quiet.

Be warm, patient and genuinely helpful. No pressure and no productivity guilt.`;

export const HEARTBEAT_INSTRUCTION =
  "This is a heartbeat check. Review the conversation history and your notes. Decide whether to reach out to the user or stay silent.";

/** Reads the system prompt file, falling back to the built-in prompt when it is missing. */
export const loadSystemPrompt = async (promptFile: string): Promise<string> => {
  try {
    const text = (await readFile(promptFile, "utf8")).trim();
    if (text) return text;
    log.warn("System prompt file is empty, using fallback", { promptFile });
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
    log.warn("System prompt file not found, using fallback", { promptFile });
  }
  return FALLBACK_SYSTEM_PROMPT;
};

export const formatNotes = (notes: Note[]): string[] => {
  if (notes.length === 0) return [];
  return [
    "## Your Notes (Scratchpad):",
    ...notes.slice(-NOTES_IN_CONTEXT).map((note) => `- [${note.timestamp}] ${note.content}`),
    "",
  ];
};

export const formatConversation = (messages: Message[]): string[] => [
  "## Recent Conversation:",
  ...(messages.length > 0
    ? messages.map((message) => `[${message.timestamp}] ${message.role}: ${message.content}`)
    : ["(No conversation history yet)"]),
];

export const buildHeartbeatSystemPrompt = (base: string, notes: Note[], messages: Message[]): string =>
  `${base}\n\n${[...formatNotes(notes), ...formatConversation(messages)].join("\n")}`;

export const buildResponseSystemPrompt = (base: string, notes: Note[]): string => {
  const context = formatNotes(notes);
  return context.length > 0 ? `${base}\n\n${context.join("\n")}` : base;
};
