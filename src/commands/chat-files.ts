import path from "node:path";
import { createEmptyChat } from "../chat-document.js";
import { summarizeError } from "../errors.js";
import { commandSignal, type CommandResult } from "../orchestration/actions.js";
import { sanitizeErrorMessage } from "../sanitize.js";
import { confirmYes } from "./shared.js";
import type { CommandContext, CommandDefinition } from "./types.js";

const NO_CHAT_OPEN_HINT = "No chat is currently open. Use /new or /open.";

function errorText(error: unknown): string {
  return sanitizeErrorMessage(summarizeError(error));
}

function samePath(a: string | null, b: string): boolean {
  return a !== null && path.resolve(a) === path.resolve(b);
}

/** Resolve a name or path typed by the user to an existing chat file. */
function resolveExistingChat(context: CommandContext, nameOrPath: string): string {
  const store = context.manager.store;
  const resolved = store.resolvePath(context.manager.profile.chatsDir, nameOrPath);
  if (!store.exists(resolved)) {
    throw new Error(`Chat not found: ${nameOrPath}`);
  }
  return resolved;
}

async function promptChatSelection(context: CommandContext, action: string): Promise<string | null> {
  const chats = context.manager.store.list(context.manager.profile.chatsDir);
  if (chats.length === 0) {
    context.interaction.notify(`No chats found in ${context.manager.profile.chatsDir}`);
    return null;
  }
  return context.interaction.promptSelection(
    chats.map((chat) => ({
      value: chat.path,
      label: `${chat.filename} | ${chat.title ?? "(untitled)"} | ${chat.messageCount} msgs`,
    })),
    { title: `Select a chat to ${action}:`, allowCancel: true },
  );
}

const newCommand: CommandDefinition = {
  name: "new",
  usage: "/new [name]",
  description: "create a chat file and switch to it",
  async run(args, context) {
    const manager = context.manager;
    const chatPath = manager.store.generatePath(manager.profile.chatsDir, args || undefined);

    if (!manager.chatPath) {
      const answer = (await context.interaction.promptText("No chat is open. Open the new chat now? [Y/n]: "))
        .trim()
        .toLowerCase();
      if (answer === "n" || answer === "no") {
        manager.store.save(chatPath, createEmptyChat());
        return `Created new chat (not opened): ${chatPath}`;
      }
      if (answer !== "" && answer !== "y" && answer !== "yes") {
        return "Cancelled";
      }
    }

    return commandSignal("new_chat", { chatPath });
  },
};

async function openChat(args: string, context: CommandContext): Promise<CommandResult> {
  let selected: string | null;
  if (args) {
    try {
      selected = resolveExistingChat(context, args);
    } catch (error) {
      return errorText(error);
    }
  } else {
    selected = await promptChatSelection(context, "open");
  }
  if (!selected) {
    return "Chat open cancelled";
  }

  try {
    context.manager.store.load(selected);
  } catch (error) {
    return `Error loading chat: ${errorText(error)}`;
  }
  return commandSignal("open_chat", { chatPath: selected });
}

const openCommand: CommandDefinition = {
  name: "open",
  usage: "/open [name]",
  description: "open a saved chat (pick from a list when no name is given)",
  run: openChat,
};

const switchCommand: CommandDefinition = {
  name: "switch",
  usage: "/switch [name]",
  description: "save the current chat and open another",
  run: openChat,
};

const closeCommand: CommandDefinition = {
  name: "close",
  usage: "/close",
  description: "save and close the current chat",
  async run(_args, { manager }) {
    if (!manager.chatPath) {
      return NO_CHAT_OPEN_HINT;
    }
    return commandSignal("close_chat");
  },
};

const renameCommand: CommandDefinition = {
  name: "rename",
  usage: "/rename [chat] <new_name>",
  description: "rename the current chat, or another chat when one is named first",
  async run(args, context) {
    const manager = context.manager;
    const chatsDir = manager.profile.chatsDir;

    let source: string;
    let newName: string;
    if (!args) {
      const selected = await promptChatSelection(context, "rename");
      if (!selected) {
        return "Rename cancelled";
      }
      newName = (await context.interaction.promptText("Enter new name: ")).trim();
      if (!newName) {
        return "Rename cancelled";
      }
      source = selected;
    } else {
      const [first = "", ...rest] = args.split(/\s+/);
      const remainder = rest.join(" ");
      let target: string | null = null;
      if (remainder && first !== "current") {
        try {
          target = resolveExistingChat(context, first);
        } catch {
          // not a chat name, so the whole argument is the new name
          target = null;
        }
      }
      if (target) {
        source = target;
        newName = remainder;
      } else {
        if (!manager.chatPath) {
          return "No chat is currently open";
        }
        source = manager.chatPath;
        newName = first === "current" && remainder ? remainder : args;
      }
    }

    const isCurrent = samePath(manager.chatPath, source);
    try {
      if (isCurrent) {
        manager.saveCurrentChat();
      }
      const renamed = manager.store.rename(source, newName, chatsDir);
      if (isCurrent) {
        return commandSignal("rename_current", { chatPath: renamed });
      }
      return `Renamed: ${path.basename(source)} → ${path.basename(renamed)}`;
    } catch (error) {
      return `Error renaming chat: ${errorText(error)}`;
    }
  },
};

const deleteCommand: CommandDefinition = {
  name: "delete",
  usage: "/delete [name|current]",
  description: "permanently delete a chat file",
  async run(args, context) {
    const manager = context.manager;
    let selected: string | null;
    if (!args) {
      selected = await promptChatSelection(context, "delete");
      if (!selected) {
        return "Delete cancelled";
      }
    } else if (args === "current") {
      if (!manager.chatPath) {
        return NO_CHAT_OPEN_HINT;
      }
      selected = manager.chatPath;
    } else {
      try {
        selected = resolveExistingChat(context, args);
      } catch (error) {
        return errorText(error);
      }
    }

    const filename = path.basename(selected);
    context.interaction.notify(`WARNING: This will permanently delete: ${filename}`);
    if (!(await confirmYes(context, "Type 'yes' to confirm deletion: "))) {
      return "Deletion cancelled";
    }

    try {
      manager.store.remove(selected);
    } catch (error) {
      return `Error deleting chat: ${errorText(error)}`;
    }
    if (samePath(manager.chatPath, selected)) {
      return commandSignal("delete_current", { value: filename });
    }
    return `Deleted: ${filename}`;
  },
};

export const CHAT_FILE_COMMANDS: CommandDefinition[] = [
  newCommand,
  openCommand,
  switchCommand,
  closeCommand,
  renameCommand,
  deleteCommand,
];
