import type {
  ChatDocument,
  ChatMessage,
  ChatMetadata,
  ChatRole,
  Citation,
} from "./chat-types.js";
import { ChatDocumentError } from "./errors.js";

const METADATA_KEYS = new Set(["title", "summary", "system_prompt", "created_utc", "updated_utc"]);
const MESSAGE_KEYS = new Set([
  "timestamp_utc",
  "role",
  "content",
  "model",
  "citations",
  "details",
  "hex_id",
  "reference_id",
]);

export type MetadataField = "title" | "summary" | "systemPrompt";

export type LastInteractionKind = "user_assistant" | "user_error" | "standalone_error";

export type LastInteractionSpan = {
  kind: LastInteractionKind;
  replaceStart: number;
  replaceEnd: number;
  contextEndExclusive: number;
};

export function utcNow(): string {
  return new Date().toISOString();
}

/** Split text into lines, trimming blank lines at both ends. */
export function textToLines(text: string): string[] {
  const lines = text.split("\n");
  const start = lines.findIndex((line) => line.trim().length > 0);
  if (start < 0) {
    return [];
  }
  let end = lines.length;
  while (end > start && !lines[end - 1]?.trim()) {
    end -= 1;
  }
  return lines.slice(start, end);
}

export function messageText(message: ChatMessage): string {
  return message.content.join("\n");
}

export function createEmptyChat(): ChatDocument {
  return {
    metadata: {
      title: null,
      summary: null,
      systemPrompt: null,
      createdUtc: null,
      updatedUtc: null,
    },
    messages: [],
  };
}

export function newUserMessage(text: string): ChatMessage {
  return { role: "user", content: textToLines(text), timestamp: utcNow() };
}

export function newAssistantMessage(text: string, model: string, citations?: Citation[]): ChatMessage {
  const message: ChatMessage = {
    role: "assistant",
    content: textToLines(text),
    timestamp: utcNow(),
    model,
  };
  if (citations && citations.length > 0) {
    message.citations = citations;
  }
  return message;
}

export function newErrorMessage(text: string, details?: Record<string, unknown>): ChatMessage {
  const message: ChatMessage = { role: "error", content: textToLines(text), timestamp: utcNow() };
  if (details) {
    message.details = details;
  }
  return message;
}

export function addUserMessage(chat: ChatDocument, text: string): ChatMessage {
  const message = newUserMessage(text);
  chat.messages.push(message);
  return message;
}

export function addAssistantMessage(
  chat: ChatDocument,
  text: string,
  model: string,
  citations?: Citation[],
): ChatMessage {
  const message = newAssistantMessage(text, model, citations);
  chat.messages.push(message);
  return message;
}

export function addErrorMessage(
  chat: ChatDocument,
  text: string,
  details?: Record<string, unknown>,
): ChatMessage {
  const message = newErrorMessage(text, details);
  chat.messages.push(message);
  return message;
}

/** Remove the message at `index` and everything after it. Returns the removed count. */
export function deleteMessageAndFollowing(chat: ChatDocument, index: number): number {
  if (index < 0 || index >= chat.messages.length) {
    throw new RangeError("Message index out of range");
  }
  return chat.messages.splice(index).length;
}

export function updateMetadata(chat: ChatDocument, field: MetadataField, value: string | null): void {
  chat.metadata[field] = value;
}

export function touchUpdatedUtc(metadata: ChatMetadata, now = utcNow()): void {
  if (!metadata.createdUtc) {
    metadata.createdUtc = now;
  }
  metadata.updatedUtc = now;
}

/** Keep only the turns a model should see. */
export function filterMessagesForModel(messages: readonly ChatMessage[]): ChatMessage[] {
  return messages.filter((message) => message.role === "user" || message.role === "assistant");
}

export function getMessagesForModel(chat: ChatDocument): ChatMessage[] {
  return filterMessagesForModel(chat.messages);
}

export function hasPendingError(chat: ChatDocument): boolean {
  return chat.messages.at(-1)?.role === "error";
}

export function resolveLastInteractionSpan(messages: readonly ChatMessage[]): LastInteractionSpan | null {
  const lastIndex = messages.length - 1;
  const last = messages[lastIndex];
  if (!last) {
    return null;
  }
  const previous = messages[lastIndex - 1];

  if (last.role === "assistant") {
    if (previous?.role !== "user") {
      return null;
    }
    return {
      kind: "user_assistant",
      replaceStart: lastIndex - 1,
      replaceEnd: lastIndex,
      contextEndExclusive: lastIndex - 1,
    };
  }

  if (last.role === "error") {
    if (previous?.role === "user") {
      return {
        kind: "user_error",
        replaceStart: lastIndex - 1,
        replaceEnd: lastIndex,
        contextEndExclusive: lastIndex - 1,
      };
    }
    return {
      kind: "standalone_error",
      replaceStart: lastIndex,
      replaceEnd: lastIndex,
      contextEndExclusive: lastIndex,
    };
  }

  return null;
}

/** Model-visible context that precedes the interaction being retried. */
export function getRetryContextForLastInteraction(chat: ChatDocument): ChatMessage[] {
  const span = resolveLastInteractionSpan(chat.messages);
  if (!span) {
    return getMessagesForModel(chat);
  }
  return filterMessagesForModel(chat.messages.slice(0, span.contextEndExclusive));
}

export function cloneMessage(message: ChatMessage): ChatMessage {
  return structuredClone(message);
}

export function cloneChat(chat: ChatDocument): ChatDocument {
  return structuredClone(chat);
}

/** Parse the persisted JSON shape. Reference ids in the input are ignored. */
export function parseChatDocument(raw: unknown): ChatDocument {
  if (!isRecord(raw)) {
    throw new ChatDocumentError("Invalid chat history file structure");
  }
  const rawMessages = raw.messages ?? [];
  if (!Array.isArray(rawMessages)) {
    throw new ChatDocumentError("Invalid chat messages: expected list");
  }
  const rawMetadata = raw.metadata ?? {};
  if (!isRecord(rawMetadata)) {
    throw new ChatDocumentError("Invalid chat metadata: expected object");
  }

  return {
    metadata: parseMetadata(rawMetadata),
    messages: rawMessages.map((item, index) => parseMessage(item, index)),
  };
}

export function serializeChatDocument(chat: ChatDocument): Record<string, unknown> {
  const metadata: Record<string, unknown> = {
    title: chat.metadata.title,
    summary: chat.metadata.summary,
    system_prompt: chat.metadata.systemPrompt,
    created_utc: chat.metadata.createdUtc,
    updated_utc: chat.metadata.updatedUtc,
    ...chat.metadata.extras,
  };
  return {
    metadata,
    messages: chat.messages.map((message) => serializeMessage(message)),
  };
}

function serializeMessage(message: ChatMessage): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    timestamp_utc: message.timestamp ?? null,
    role: message.role,
    content: [...message.content],
  };
  if (message.model) {
    payload.model = message.model;
  }
  if (message.citations && message.citations.length > 0) {
    payload.citations = message.citations.map((citation) => ({ ...citation }));
  }
  if (message.details) {
    payload.details = { ...message.details };
  }
  return { ...payload, ...message.extras };
}

function parseMetadata(raw: Record<string, unknown>): ChatMetadata {
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!METADATA_KEYS.has(key)) {
      extras[key] = value;
    }
  }
  const metadata: ChatMetadata = {
    title: readOptionalString(raw.title),
    summary: readOptionalString(raw.summary),
    systemPrompt: readOptionalString(raw.system_prompt),
    createdUtc: readOptionalString(raw.created_utc),
    updatedUtc: readOptionalString(raw.updated_utc),
  };
  if (Object.keys(extras).length > 0) {
    metadata.extras = extras;
  }
  return metadata;
}

function parseMessage(raw: unknown, index: number): ChatMessage {
  if (!isRecord(raw)) {
    throw new ChatDocumentError(`Invalid chat message at index ${index}: expected object`);
  }
  if (!("content" in raw)) {
    throw new ChatDocumentError(`Invalid chat message at index ${index}: missing content`);
  }
  const role = raw.role;
  if (!isChatRole(role)) {
    throw new ChatDocumentError(`Invalid chat message at index ${index}: unknown role`);
  }

  const message: ChatMessage = {
    role,
    content: parseContent(raw.content, index),
  };
  const timestamp = readOptionalString(raw.timestamp_utc);
  if (timestamp) {
    message.timestamp = timestamp;
  }
  const model = readOptionalString(raw.model);
  if (model) {
    message.model = model;
  }
  const citations = parseCitations(raw.citations);
  if (citations.length > 0) {
    message.citations = citations;
  }
  if (isRecord(raw.details)) {
    message.details = { ...raw.details };
  }

  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!MESSAGE_KEYS.has(key)) {
      extras[key] = value;
    }
  }
  if (Object.keys(extras).length > 0) {
    message.extras = extras;
  }
  return message;
}

function parseContent(raw: unknown, index: number): string[] {
  if (typeof raw === "string") {
    return textToLines(raw);
  }
  if (Array.isArray(raw)) {
    return raw.map((part) => String(part));
  }
  throw new ChatDocumentError(`Invalid chat message at index ${index}: expected string or list content`);
}

function parseCitations(raw: unknown): Citation[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const citations: Citation[] = [];
  for (const item of raw) {
    if (!isRecord(item)) {
      continue;
    }
    const citation: Citation = {
      title: readOptionalString(item.title),
      url: readOptionalString(item.url),
    };
    if (typeof item.number === "number" && Number.isInteger(item.number)) {
      citation.number = item.number;
    }
    citations.push(citation);
  }
  return citations;
}

function isChatRole(value: unknown): value is ChatRole {
  return value === "user" || value === "assistant" || value === "error";
}

function readOptionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
