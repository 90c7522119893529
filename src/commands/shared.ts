import type { SessionManager } from "../session/session-manager.js";
import { providerSupportsSearch } from "../models.js";
import type { CommandContext } from "./types.js";

export const NO_CHAT_OPEN = "No chat is currently open";
export const BORDER = "━".repeat(40);

/** Only an explicit "yes" confirms a destructive command. */
export async function confirmYes(context: CommandContext, prompt: string): Promise<boolean> {
  const answer = await context.interaction.promptText(prompt);
  return answer.trim().toLowerCase() === "yes";
}

/** Turn off modes the given provider cannot serve, returning a notice for each. */
export function reconcileProviderModes(manager: SessionManager, provider = manager.currentProvider): string[] {
  const notices: string[] = [];
  if (manager.searchMode && !providerSupportsSearch(provider)) {
    manager.searchMode = false;
    notices.push(`Search mode auto-disabled: ${provider} does not support search.`);
  }
  return notices;
}

export function withNotices(message: string, notices: string[]): string {
  return notices.length > 0 ? `${message}\n${notices.join("\n")}` : message;
}

export function formatLocalTime(timestamp: string | undefined): string {
  if (!timestamp) {
    return "unknown";
  }
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) {
    return "unknown";
  }
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/** Collapse whitespace and cut to `maxLength`, marking the cut with "...". */
export function previewText(text: string, maxLength: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxLength) {
    return flat;
  }
  return `${flat.slice(0, Math.max(0, maxLength - 3))}...`;
}
