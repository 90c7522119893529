import type { ChatDocument, ChatMessage } from "../chat-types.js";

export type ActionMode = "normal" | "retry" | "secret";

export type BreakAction = { kind: "break" };

export type PrintAction = { kind: "print"; message: string };

/** Session and chat are always read live after a continue; it never carries them. */
export type ContinueAction = { kind: "continue"; message?: string };

export type SendAction = {
  kind: "send";
  mode: ActionMode;
  messages: ChatMessage[];
  searchEnabled?: boolean;
  userInput?: string;
  assistantId?: string;
  chatPath?: string;
  chatData?: ChatDocument;
};

export type OrchestratorAction = BreakAction | PrintAction | ContinueAction | SendAction;

export type CommandSignalKind =
  | "exit"
  | "new_chat"
  | "open_chat"
  | "close_chat"
  | "rename_current"
  | "delete_current"
  | "apply_retry"
  | "cancel_retry"
  | "clear_secret_context";

export type CommandSignal = {
  kind: CommandSignalKind;
  chatPath?: string;
  value?: string;
};

export type CommandResult = string | CommandSignal | null;

export function breakAction(): BreakAction {
  return { kind: "break" };
}

export function printAction(message: string): PrintAction {
  return { kind: "print", message };
}

export function continueAction(message?: string): ContinueAction {
  return message === undefined ? { kind: "continue" } : { kind: "continue", message };
}

export function commandSignal(kind: CommandSignalKind, fields: { chatPath?: string; value?: string } = {}): CommandSignal {
  return { kind, ...fields };
}

export function isCommandSignal(result: CommandResult): result is CommandSignal {
  return typeof result === "object" && result !== null;
}
