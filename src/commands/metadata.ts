import fs from "node:fs";
import type { ChatMessage } from "../chat-types.js";
import { getMessagesForModel, messageText, updateMetadata, type MetadataField } from "../chat-document.js";
import { summarizeError } from "../errors.js";
import { getMessageIndex } from "../reference-ids.js";
import { sanitizeErrorMessage } from "../sanitize.js";
import type { SessionManager } from "../session/session-manager.js";
import { BORDER, NO_CHAT_OPEN } from "./shared.js";
import type { CommandContext, CommandDefinition, HelperTask } from "./types.js";

const CONTEXT_PLACEHOLDER = "{CONTEXT}";

const DEFAULT_TITLE_TEMPLATE = [
  "Write a short title (at most 8 words) for the conversation below.",
  "Reply with the title only, no quotes or punctuation at the end.",
  "",
  CONTEXT_PLACEHOLDER,
].join("\n");

const DEFAULT_SUMMARY_TEMPLATE = [
  "Summarize the conversation below in one short paragraph.",
  "Focus on the questions asked and the conclusions reached.",
  "",
  CONTEXT_PLACEHOLDER,
].join("\n");

const DEFAULT_SAFETY_TEMPLATE = [
  "Review the conversation below for unsafe content: harmful instructions, personal data,",
  "harassment or anything that breaks common usage policies.",
  "List each concern with the role it came from, or reply that nothing was found.",
  "",
  CONTEXT_PLACEHOLDER,
].join("\n");

export function formatConversationForPrompt(messages: readonly ChatMessage[]): string {
  return messages
    .map((message) => `${message.role === "user" ? "User" : "Assistant"}: ${messageText(message)}`)
    .join("\n\n");
}

/** Fill a prompt template; a template file without the placeholder gets the context appended. */
export function buildHelperPrompt(templatePath: string | null, fallback: string, conversation: string): string {
  const template = templatePath ? fs.readFileSync(templatePath, "utf8") : fallback;
  if (!template.includes(CONTEXT_PLACEHOLDER)) {
    return `${template.trimEnd()}\n\n${conversation}`;
  }
  return template.split(CONTEXT_PLACEHOLDER).join(conversation);
}

function setAndSave(manager: SessionManager, field: MetadataField, value: string | null): void {
  updateMetadata(manager.chat, field, value);
  manager.saveCurrentChat();
}

async function generate(
  context: CommandContext,
  task: HelperTask,
  templatePath: string | null,
  fallback: string,
): Promise<string> {
  const conversation = formatConversationForPrompt(getMessagesForModel(context.manager.chat));
  const prompt = buildHelperPrompt(templatePath, fallback, conversation);
  return context.invokeHelper({ task, prompt });
}

/** Every turn, errors included, labelled by its stored role. */
export function formatMessagesForSafetyCheck(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `${message.role}: ${messageText(message)}`).join("\n");
}

const titleCommand: CommandDefinition = {
  name: "title",
  usage: "/title [text|--]",
  description: "set or clear the chat title, or generate one with the helper model",
  async run(args, context) {
    const manager = context.manager;
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    if (args === "--") {
      setAndSave(manager, "title", null);
      return "Title cleared";
    }
    if (args) {
      setAndSave(manager, "title", args);
      return `Title set to: ${args}`;
    }

    if (getMessagesForModel(manager.chat).length === 0) {
      return "No messages in chat to generate title from";
    }
    try {
      const raw = await generate(context, "title_generation", manager.profile.titlePrompt, DEFAULT_TITLE_TEMPLATE);
      const title = raw.trim().replace(/^["']+|["']+$/g, "").trim();
      setAndSave(manager, "title", title);
      return `Title generated: ${title}`;
    } catch (error) {
      return `Error generating title: ${sanitizeErrorMessage(summarizeError(error))}`;
    }
  },
};

const summaryCommand: CommandDefinition = {
  name: "summary",
  usage: "/summary [text|--]",
  description: "set or clear the chat summary, or generate one with the helper model",
  async run(args, context) {
    const manager = context.manager;
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    if (args === "--") {
      setAndSave(manager, "summary", null);
      return "Summary cleared";
    }
    if (args) {
      setAndSave(manager, "summary", args);
      return "Summary set";
    }

    if (getMessagesForModel(manager.chat).length === 0) {
      return "No messages in chat to generate summary from";
    }
    try {
      const summary = (
        await generate(context, "summary_generation", manager.profile.summaryPrompt, DEFAULT_SUMMARY_TEMPLATE)
      ).trim();
      setAndSave(manager, "summary", summary);
      return `Summary generated:\n${summary}`;
    } catch (error) {
      return `Error generating summary: ${sanitizeErrorMessage(summarizeError(error))}`;
    }
  },
};

const safeCommand: CommandDefinition = {
  name: "safe",
  usage: "/safe [id]",
  description: "ask the helper model to check one message or the whole chat for unsafe content",
  async run(args, context) {
    const manager = context.manager;
    if (!manager.chatPath) {
      return NO_CHAT_OPEN;
    }
    const messages = manager.chat.messages;
    if (messages.length === 0) {
      return "No messages to check";
    }

    let checked: readonly ChatMessage[] = messages;
    let scope = "entire chat";
    if (args) {
      const index = getMessageIndex(args, messages);
      const message = index === null ? undefined : messages[index];
      if (!message) {
        return `Invalid reference ID: ${args}`;
      }
      checked = [message];
      scope = `message [${args.toLowerCase()}]`;
    }

    try {
      const prompt = buildHelperPrompt(
        manager.profile.safetyPrompt,
        DEFAULT_SAFETY_TEMPLATE,
        formatMessagesForSafetyCheck(checked),
      );
      const result = await context.invokeHelper({ task: "safety_check", prompt });
      return [`Safety Check Results (${scope}):`, BORDER, result.trim(), BORDER].join("\n");
    } catch (error) {
      return `Error performing safety check: ${sanitizeErrorMessage(summarizeError(error))}`;
    }
  },
};

export const METADATA_COMMANDS: CommandDefinition[] = [titleCommand, summaryCommand, safeCommand];
