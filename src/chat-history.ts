import fs from "node:fs";
import path from "node:path";
import type { ChatDocument } from "./chat-types.js";
import {
  createEmptyChat,
  isRecord,
  parseChatDocument,
  serializeChatDocument,
  touchUpdatedUtc,
  utcNow,
} from "./chat-document.js";
import { expandHomePath } from "./config.js";
import { ChatDocumentError } from "./errors.js";

export const CHAT_FILE_EXTENSION = ".json";
const CHAT_FILE_PREFIX = "chorus";

export type ChatListEntry = {
  filename: string;
  path: string;
  title: string | null;
  createdUtc: string | null;
  updatedUtc: string | null;
  messageCount: number;
};

export function loadChat(chatPath: string): ChatDocument {
  if (!fs.existsSync(chatPath)) {
    return createEmptyChat();
  }
  const raw = fs.readFileSync(chatPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ChatDocumentError(`Invalid JSON in chat history file: ${reason}`);
  }
  return parseChatDocument(parsed);
}

/**
 * Persist `chat` to `chatPath`. Returns false when the file already holds
 * the same content (ignoring `updated_utc`); the in-memory timestamps are
 * then synced from disk instead.
 */
export function saveChat(chatPath: string, chat: ChatDocument, now = utcNow()): boolean {
  const existing = readExistingPayload(chatPath);
  if (existing && canonicalJson(existing) === canonicalJson(serializeChatDocument(chat))) {
    const metadata = existing.metadata;
    if (isRecord(metadata)) {
      chat.metadata.createdUtc = typeof metadata.created_utc === "string" ? metadata.created_utc : null;
      chat.metadata.updatedUtc = typeof metadata.updated_utc === "string" ? metadata.updated_utc : null;
    }
    return false;
  }

  touchUpdatedUtc(chat.metadata, now);
  const payload = `${JSON.stringify(serializeChatDocument(chat), null, 2)}\n`;
  const tmpPath = `${chatPath}.tmp`;
  fs.mkdirSync(path.dirname(chatPath), { recursive: true });
  fs.writeFileSync(tmpPath, payload, "utf8");
  fs.renameSync(tmpPath, chatPath);
  return true;
}

export function listChats(chatsDir: string): ChatListEntry[] {
  if (!fs.existsSync(chatsDir)) {
    return [];
  }

  const entries: ChatListEntry[] = [];
  for (const filename of fs.readdirSync(chatsDir)) {
    if (!filename.endsWith(CHAT_FILE_EXTENSION)) {
      continue;
    }
    const filePath = path.join(chatsDir, filename);
    try {
      const chat = parseChatDocument(JSON.parse(fs.readFileSync(filePath, "utf8")));
      entries.push({
        filename,
        path: filePath,
        title: chat.metadata.title,
        createdUtc: chat.metadata.createdUtc,
        updatedUtc: chat.metadata.updatedUtc,
        messageCount: chat.messages.length,
      });
    } catch {
      // not a chat file
    }
  }

  return entries.sort((a, b) => {
    const byUpdated = (b.updatedUtc ?? "").localeCompare(a.updatedUtc ?? "");
    return byUpdated !== 0 ? byUpdated : b.filename.localeCompare(a.filename);
  });
}

export function generateChatFilename(chatsDir: string, name?: string, now = new Date()): string {
  const trimmed = name?.trim() ?? "";
  const stem = trimmed
    ? trimmed.replace(/\.json$/i, "").replace(/[^A-Za-z0-9_-]/g, "_")
    : `${CHAT_FILE_PREFIX}_${formatFilenameTimestamp(now)}`;

  let candidate = path.join(chatsDir, `${stem}${CHAT_FILE_EXTENSION}`);
  let counter = 1;
  while (fs.existsSync(candidate)) {
    candidate = path.join(chatsDir, `${stem}_${counter}${CHAT_FILE_EXTENSION}`);
    counter += 1;
  }
  return candidate;
}

/** Resolve a user-supplied chat name or path to a file inside `chatsDir` (absolute paths pass through). */
export function resolveChatPath(chatsDir: string, nameOrPath: string): string {
  const value = expandHomePath(nameOrPath.trim());
  if (path.isAbsolute(value)) {
    return path.resolve(value);
  }
  const withExtension = value.endsWith(CHAT_FILE_EXTENSION) ? value : `${value}${CHAT_FILE_EXTENSION}`;
  const resolvedDir = path.resolve(chatsDir);
  const resolved = path.resolve(resolvedDir, withExtension);
  if (!isInside(resolvedDir, resolved)) {
    throw new Error(`Invalid path: ${nameOrPath} (outside chats directory)`);
  }
  return resolved;
}

export function renameChat(oldPath: string, newName: string, chatsDir: string): string {
  if (!fs.existsSync(oldPath)) {
    throw new Error(`Chat file not found: ${oldPath}`);
  }
  const target = resolveChatPath(chatsDir, newName);
  if (fs.existsSync(target)) {
    throw new Error(`Chat file already exists: ${target}`);
  }
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.renameSync(oldPath, target);
  return target;
}

export function deleteChat(chatPath: string): void {
  if (!fs.existsSync(chatPath)) {
    throw new Error(`Chat file not found: ${chatPath}`);
  }
  fs.unlinkSync(chatPath);
}

function readExistingPayload(chatPath: string): Record<string, unknown> | null {
  if (!fs.existsSync(chatPath)) {
    return null;
  }
  try {
    const chat = parseChatDocument(JSON.parse(fs.readFileSync(chatPath, "utf8")));
    return serializeChatDocument(chat);
  } catch {
    // unreadable file: overwrite with a fresh payload
    return null;
  }
}

function canonicalJson(payload: Record<string, unknown>): string {
  const metadata = isRecord(payload.metadata) ? { ...payload.metadata, updated_utc: null } : payload.metadata;
  return JSON.stringify({ ...payload, metadata });
}

function formatFilenameTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

function isInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

/** File-system operations the session layer performs on chat documents. */
export type ConversationStore = {
  exists(chatPath: string): boolean;
  load(chatPath: string): ChatDocument;
  save(chatPath: string, chat: ChatDocument): boolean;
  list(chatsDir: string): ChatListEntry[];
  generatePath(chatsDir: string, name?: string): string;
  resolvePath(chatsDir: string, nameOrPath: string): string;
  rename(oldPath: string, newName: string, chatsDir: string): string;
  remove(chatPath: string): void;
};

export const fileConversationStore: ConversationStore = {
  exists: (chatPath) => fs.existsSync(chatPath),
  load: loadChat,
  save: (chatPath, chat) => saveChat(chatPath, chat),
  list: listChats,
  generatePath: (chatsDir, name) => generateChatFilename(chatsDir, name),
  resolvePath: resolveChatPath,
  rename: renameChat,
  remove: deleteChat,
};
