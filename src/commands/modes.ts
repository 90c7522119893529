import path from "node:path";
import {
  getMessagesForModel,
  getRetryContextForLastInteraction,
  resolveLastInteractionSpan,
  updateMetadata,
} from "../chat-document.js";
import { CommandError, SessionModeError } from "../errors.js";
import { providerSupportsSearch, searchSupportedProviders } from "../models.js";
import { commandSignal } from "../orchestration/actions.js";
import { isReferenceId } from "../reference-ids.js";
import type { SessionManager } from "../session/session-manager.js";
import { loadSystemPrompt, readSystemPromptFile } from "../session/system-prompt.js";
import { NO_CHAT_OPEN } from "./shared.js";
import type { CommandDefinition } from "./types.js";

function profileBaseDir(manager: SessionManager): string {
  return manager.profilePath ? path.dirname(manager.profilePath) : process.cwd();
}

/** Mode conflicts surface as command errors; nothing was changed. */
function enterMode(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof SessionModeError) {
      throw new CommandError(error.message);
    }
    throw error;
  }
}

const inputCommand: CommandDefinition = {
  name: "input",
  usage: "/input [quick|compose|default]",
  description: "show or set how Enter behaves",
  async run(args, { manager }) {
    if (!args) {
      return manager.inputMode === "quick"
        ? "Input mode: quick (Enter sends)"
        : "Input mode: compose (Enter adds a line, empty line sends)";
    }
    const value = args.toLowerCase();
    if (value === "default") {
      manager.inputMode = manager.profile.inputMode;
      return `Input mode restored to profile default: ${manager.inputMode}`;
    }
    if (value === "quick") {
      manager.inputMode = value;
      return "Input mode set to quick (Enter sends)";
    }
    if (value === "compose") {
      manager.inputMode = value;
      return "Input mode set to compose (Enter adds a line)";
    }
    throw new CommandError("Invalid input mode. Use /input quick, /input compose, or /input default.");
  },
};

const systemCommand: CommandDefinition = {
  name: "system",
  usage: "/system [path|--|default]",
  description: "show, set, remove or restore the system prompt for this chat",
  async run(args, { manager }) {
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const chat = manager.chat;

    if (!args) {
      const current = chat.metadata.systemPrompt ?? manager.systemPromptPath;
      return current ? `Current system prompt: ${current}` : "No system prompt set for this chat";
    }

    if (args === "--") {
      updateMetadata(chat, "systemPrompt", null);
      manager.systemPrompt = null;
      manager.systemPromptPath = null;
      manager.saveCurrentChat();
      return "System prompt removed from chat";
    }

    if (args === "default") {
      if (!manager.profile.systemPrompt) {
        return "No default system prompt configured in profile";
      }
      const loaded = loadSystemPrompt(manager.profile.systemPrompt, profileBaseDir(manager));
      if (loaded.warning) {
        throw new CommandError(loaded.warning);
      }
      updateMetadata(chat, "systemPrompt", loaded.path);
      manager.systemPrompt = loaded.content;
      manager.systemPromptPath = loaded.path;
      manager.saveCurrentChat();
      return loaded.path === null && loaded.content
        ? "System prompt restored to inline profile default (content hidden)"
        : "System prompt restored to profile default";
    }

    let loaded: { content: string; path: string };
    try {
      loaded = readSystemPromptFile(args, profileBaseDir(manager));
    } catch (error) {
      throw new CommandError(error instanceof Error ? error.message : String(error));
    }
    updateMetadata(chat, "systemPrompt", loaded.path);
    manager.systemPrompt = loaded.content;
    manager.systemPromptPath = loaded.path;
    manager.saveCurrentChat();
    return `System prompt set to: ${args}`;
  },
};

const retryCommand: CommandDefinition = {
  name: "retry",
  usage: "/retry",
  description: "try the last interaction again without touching history until /apply",
  async run(_args, { manager }) {
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const messages = manager.chat.messages;
    if (messages.length === 0) {
      return "No messages to retry";
    }
    const span = resolveLastInteractionSpan(messages);
    if (!span) {
      return "Last message is not an assistant response or error. Nothing to retry.";
    }
    const context = getRetryContextForLastInteraction(manager.chat);
    enterMode(() => manager.retry.enter(context, span.replaceEnd));
    return "Retry mode enabled";
  },
};

const applyCommand: CommandDefinition = {
  name: "apply",
  usage: "/apply [id|last]",
  description: "replace the retried interaction with an attempt and leave retry mode",
  async run(args, { manager }) {
    if (!manager.retry.active) {
      return "Not in retry mode";
    }
    const value = args.toLowerCase();
    if (!value || value === "last") {
      const latest = manager.retry.latestAttemptId();
      if (!latest) {
        return "No retry attempts available yet";
      }
      return commandSignal("apply_retry", { value: latest });
    }
    if (!isReferenceId(value)) {
      return `Invalid reference ID: ${args}`;
    }
    return commandSignal("apply_retry", { value });
  },
};

const cancelCommand: CommandDefinition = {
  name: "cancel",
  usage: "/cancel",
  description: "leave retry mode and keep the original messages",
  async run(_args, { manager }) {
    if (!manager.retry.active) {
      return "Not in retry mode";
    }
    return commandSignal("cancel_retry");
  },
};

const secretCommand: CommandDefinition = {
  name: "secret",
  usage: "/secret [on|off]",
  description: "show or toggle off-record messages",
  async run(args, { manager }) {
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const value = args.toLowerCase();
    if (!value) {
      return manager.secret.active ? "Secret mode: on" : "Secret mode: off";
    }
    if (value === "on") {
      if (manager.secret.active) {
        return "Secret mode already on";
      }
      const context = getMessagesForModel(manager.chat);
      enterMode(() => manager.secret.enter(context));
      return "Secret mode enabled";
    }
    if (value === "off") {
      return manager.secret.active ? commandSignal("clear_secret_context") : "Secret mode already off";
    }
    if (value === "on/off" || value === "on|off") {
      return "Use /secret on or /secret off";
    }
    throw new CommandError("Invalid argument. Use /secret on or /secret off");
  },
};

const searchCommand: CommandDefinition = {
  name: "search",
  usage: "/search [on|off]",
  description: "show or toggle web search for supported providers",
  async run(args, { manager }) {
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const supported = searchSupportedProviders().join(", ");
    const value = args.toLowerCase();
    if (!value) {
      return `Search mode: ${manager.searchMode ? "on" : "off"}\nSupported providers: ${supported}`;
    }
    if (value === "on") {
      if (!providerSupportsSearch(manager.currentProvider)) {
        return `Search not supported for ${manager.currentProvider}. Supported: ${supported}`;
      }
      if (manager.searchMode) {
        return "Search mode already on";
      }
      manager.searchMode = true;
      return "Search mode enabled";
    }
    if (value === "off") {
      if (!manager.searchMode) {
        return "Search mode already off";
      }
      manager.searchMode = false;
      return "Search mode disabled";
    }
    if (value === "on/off" || value === "on|off") {
      return "Use /search on or /search off";
    }
    throw new CommandError("Invalid argument. Use /search on or /search off");
  },
};

export const MODE_COMMANDS: CommandDefinition[] = [
  inputCommand,
  systemCommand,
  retryCommand,
  applyCommand,
  cancelCommand,
  secretCommand,
  searchCommand,
];
