import type { ChatMessage } from "../chat-types.js";
import { deleteMessageAndFollowing, messageText } from "../chat-document.js";
import { CommandError } from "../errors.js";
import { getMessageIndex, isReferenceId } from "../reference-ids.js";
import { formatTimeout } from "../session/timeouts.js";
import { BORDER, NO_CHAT_OPEN, confirmYes, formatLocalTime, previewText } from "./shared.js";
import type { CommandDefinition } from "./types.js";

const HISTORY_DEFAULT_LIMIT = 10;
const MESSAGE_PREVIEW_LENGTH = 100;

function roleLabel(message: ChatMessage): string {
  if (message.role === "assistant") {
    return message.model ? `Assistant | ${message.model}` : "Assistant";
  }
  return message.role === "user" ? "User" : "Error";
}

export function formatHistoryLine(message: ChatMessage): string {
  const id = message.referenceId ? `[${message.referenceId}]` : "[---]";
  return `${id} ${roleLabel(message)}: ${previewText(messageText(message), MESSAGE_PREVIEW_LENGTH)}`;
}

/** Index of the first message a bare `/rewind` removes. */
function resolveLastTurnStart(messages: readonly ChatMessage[]): number {
  const lastIndex = messages.length - 1;
  const tail = messages[lastIndex];
  const previous = messages[lastIndex - 1];
  if (tail?.role === "error") {
    return previous?.role === "user" ? lastIndex - 1 : lastIndex;
  }
  if (messages.length < 2) {
    throw new CommandError("No complete turn to delete");
  }
  if (tail?.role !== "assistant" || previous?.role !== "user") {
    throw new CommandError("Last interaction is not a complete user+assistant or user+error turn");
  }
  return lastIndex - 1;
}

const rewindCommand: CommandDefinition = {
  name: "rewind",
  usage: "/rewind [id|last]",
  description: "delete a message and everything after it",
  async run(args, context) {
    const manager = context.manager;
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const messages = manager.chat.messages;
    if (messages.length === 0) {
      return "No messages to delete";
    }

    const target = args.toLowerCase() || "last";
    let index: number;
    if (target === "last") {
      index = resolveLastTurnStart(messages);
    } else if (isReferenceId(target)) {
      const found = getMessageIndex(target, messages);
      if (found === null) {
        throw new CommandError(`Reference ID '${target}' not found`);
      }
      index = found;
    } else {
      throw new CommandError("Invalid target. Use a reference ID or 'last'");
    }

    const referenceId = messages[index]?.referenceId;
    const label = referenceId ? `[${referenceId}]` : messages[index]?.role === "error" ? "last error" : "last turn";
    context.interaction.notify(`WARNING: Rewind will delete from ${label} onwards`);
    if (!(await confirmYes(context, "Type 'yes' to confirm rewind: "))) {
      return "Rewind cancelled";
    }

    for (let position = messages.length - 1; position >= index; position -= 1) {
      manager.removeMessageReferenceId(position);
    }
    const count = deleteMessageAndFollowing(manager.chat, index);
    manager.saveCurrentChat();
    return referenceId ? `Deleted ${count} message(s) from [${referenceId}] onwards` : `Deleted ${count} message(s)`;
  },
};

const purgeCommand: CommandDefinition = {
  name: "purge",
  usage: "/purge <id> [id...]",
  description: "delete specific messages (breaks conversation context)",
  async run(args, context) {
    const manager = context.manager;
    if (!args) {
      return "Usage: /purge <id> [id2 id3 ...]";
    }
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const messages = manager.chat.messages;
    if (messages.length === 0) {
      return "No messages to purge";
    }

    const targets: Array<{ index: number; id: string }> = [];
    for (const id of args.split(/\s+/)) {
      const index = getMessageIndex(id, messages);
      if (index === null) {
        return `Invalid reference ID: ${id}`;
      }
      if (!targets.some((target) => target.index === index)) {
        targets.push({ index, id: id.toLowerCase() });
      }
    }
    targets.sort((a, b) => a.index - b.index);
    const idList = targets.map((target) => `[${target.id}]`).join(", ");

    context.interaction.notify(`WARNING: Purging message(s) breaks conversation context: ${idList}`);
    if (!(await confirmYes(context, "Type 'yes' to confirm purge: "))) {
      return "Purge cancelled";
    }

    for (const target of [...targets].reverse()) {
      manager.popMessage(target.index);
    }
    manager.saveCurrentChat();
    return `Purged ${targets.length} message(s): ${idList}`;
  },
};

const historyCommand: CommandDefinition = {
  name: "history",
  usage: "/history [n|all|errors]",
  description: "show recent messages with their reference IDs",
  async run(args, { manager }) {
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const messages = manager.chat.messages;
    if (messages.length === 0) {
      return "No messages in chat history";
    }

    const total = messages.length;
    let shown: ChatMessage[];
    let header: string;
    if (args === "all") {
      shown = messages;
      header = `Chat History (all ${total} messages)`;
    } else if (args === "errors") {
      shown = messages.filter((message) => message.role === "error");
      if (shown.length === 0) {
        return "No error messages found";
      }
      header = `Error Messages (${shown.length} of ${total} total messages)`;
    } else {
      let limit = HISTORY_DEFAULT_LIMIT;
      if (args) {
        if (!/^-?\d+$/.test(args)) {
          return `Invalid argument: ${args}. Use a number, 'all', or 'errors'`;
        }
        limit = Number(args);
        if (limit <= 0) {
          return "Invalid number. Use a positive integer.";
        }
      }
      shown = messages.slice(-limit);
      header = `Chat History (showing ${shown.length} of ${total} messages)`;
    }

    return [header, BORDER, ...shown.map(formatHistoryLine), BORDER].join("\n");
  },
};

const showCommand: CommandDefinition = {
  name: "show",
  usage: "/show <id>",
  description: "show the full text of one message",
  async run(args, { manager }) {
    if (!args) {
      return "Usage: /show <id>";
    }
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const messages = manager.chat.messages;
    const index = getMessageIndex(args, messages);
    const message = index === null ? undefined : messages[index];
    if (!message) {
      return `Invalid reference ID: ${args}`;
    }
    const lines = [`Message [${args.toLowerCase()}] | ${roleLabel(message)} | ${formatLocalTime(message.timestamp)}`];
    lines.push(BORDER, messageText(message), BORDER);
    for (const [position, citation] of (message.citations ?? []).entries()) {
      const text = [citation.title, citation.url].filter(Boolean).join(" ");
      lines.push(`[${citation.number ?? position + 1}] ${text}`);
    }
    return lines.join("\n");
  },
};

const statusCommand: CommandDefinition = {
  name: "status",
  usage: "/status",
  description: "show session status and key paths",
  async run(_args, { manager }) {
    const snapshot = manager.snapshot();
    const profile = manager.profile;
    const metadata = manager.chat.metadata;
    const onOff = (value: boolean) => (value ? "ON" : "OFF");
    return [
      "Session Status",
      BORDER,
      "Directories",
      `Chats:     ${profile.chatsDir}`,
      `Logs:      ${profile.logsDir}`,
      "",
      "Files",
      `Profile:   ${manager.profilePath ?? "unknown"}`,
      `Chat:      ${snapshot.chatPath ?? "none"}`,
      `Log:       ${manager.logFile ?? "none"}`,
      "",
      "Chat",
      `Title:     ${metadata.title ?? "none"}`,
      `Summary:   ${metadata.summary ? previewText(metadata.summary, MESSAGE_PREVIEW_LENGTH) : "none"}`,
      `Messages:  ${snapshot.messageCount}`,
      `Updated:   ${metadata.updatedUtc ? formatLocalTime(metadata.updatedUtc) : "unknown"}`,
      "",
      "Providers",
      `Assistant: ${snapshot.currentProvider} | ${snapshot.currentModel}`,
      `Helper:    ${snapshot.helperProvider} | ${snapshot.helperModel}`,
      "",
      "Prompts",
      `System:    ${metadata.systemPrompt ?? snapshot.systemPromptPath ?? (manager.systemPrompt ? "inline" : "none")}`,
      `Title:     ${profile.titlePrompt ?? "none"}`,
      `Summary:   ${profile.summaryPrompt ?? "none"}`,
      "",
      "Modes",
      `Input:     ${snapshot.inputMode}`,
      `Retry:     ${onOff(snapshot.retryActive)}`,
      `Secret:    ${onOff(snapshot.secretActive)}`,
      `Search:    ${onOff(snapshot.searchMode)}`,
      `Timeout:   ${formatTimeout(snapshot.timeoutSeconds)}`,
      BORDER,
    ].join("\n");
  },
};

export const HISTORY_COMMANDS: CommandDefinition[] = [
  rewindCommand,
  purgeCommand,
  historyCommand,
  showCommand,
  statusCommand,
];
