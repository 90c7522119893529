import type { ChatDocument, ChatMessage, Citation } from "../chat-types.js";
import {
  addAssistantMessage,
  addErrorMessage,
  addUserMessage,
  getMessagesForModel,
  hasPendingError,
  newUserMessage,
} from "../chat-document.js";
import { ModeInactiveError, summarizeError } from "../errors.js";
import type { EventLog } from "../event-log.js";
import { sanitizeErrorMessage } from "../sanitize.js";
import type { SessionManager } from "../session/session-manager.js";
import { pendingErrorGuidance } from "../session/state.js";
import {
  breakAction,
  continueAction,
  isCommandSignal,
  printAction,
  type CommandResult,
  type CommandSignal,
  type CommandSignalKind,
  type OrchestratorAction,
  type PrintAction,
  type SendAction,
} from "./actions.js";
import { applyRetryReplacementPlan, buildRetryReplacementPlan } from "./retry-apply.js";
import {
  buildTransitionState,
  canMutateNormalChat,
  hasTrailingUserMessage,
  shouldReleaseForCancel,
  shouldReleaseForError,
  shouldReleaseForRollback,
  shouldRollbackPreSend,
} from "./transitions.js";

/** The parts of a send action the response handlers act on. */
export type ResponseContext = Pick<SendAction, "mode" | "chatPath" | "chatData" | "userInput" | "assistantId">;

type SignalHandler = (signal: CommandSignal) => OrchestratorAction;

export const NO_CHAT_OPEN_MESSAGE =
  "No chat is currently open.\nUse /new to create a new chat or /open to open an existing one.";

export const RETRY_STATE_CLEARED_MESSAGE =
  "Retry mode state was inconsistent and has been cleared.\nRun /retry again to start a new retry attempt.";

/**
 * Turns user input and command results into actions, and applies the chat
 * mutations that follow a send. Every path through here leaves the
 * persisted chat and the live reference ids consistent.
 */
export class ChatOrchestrator {
  readonly #manager: SessionManager;
  readonly #log: EventLog;
  readonly #signalHandlers: Record<CommandSignalKind, SignalHandler>;

  constructor(manager: SessionManager, log: EventLog) {
    this.#manager = manager;
    this.#log = log;
    this.#signalHandlers = {
      exit: () => breakAction(),
      new_chat: (signal) =>
        signal.chatPath
          ? this.#handleNewChat(signal.chatPath)
          : printAction("Error: Invalid command signal (missing new chat path)"),
      open_chat: (signal) =>
        signal.chatPath
          ? this.#handleOpenChat(signal.chatPath)
          : printAction("Error: Invalid command signal (missing open chat path)"),
      close_chat: () => this.#handleCloseChat(),
      rename_current: (signal) =>
        signal.chatPath
          ? this.#handleRenameCurrent(signal.chatPath)
          : printAction("Error: Invalid command signal (missing rename path)"),
      delete_current: (signal) =>
        signal.value === undefined
          ? printAction("Error: Invalid command signal (missing deleted filename)")
          : this.#handleDeleteCurrent(signal.value),
      apply_retry: (signal) => this.#handleApplyRetry(signal.value ?? ""),
      cancel_retry: () => this.#handleCancelRetry(),
      clear_secret_context: () => this.#handleClearSecret(),
    };
  }

  get manager(): SessionManager {
    return this.#manager;
  }

  handleCommandResult(result: CommandResult): OrchestratorAction {
    if (result === null) {
      return continueAction();
    }
    if (!isCommandSignal(result)) {
      return printAction(result);
    }
    return this.handleCommandSignal(result);
  }

  handleCommandSignal(signal: CommandSignal): OrchestratorAction {
    const handler: SignalHandler | undefined = this.#signalHandlers[signal.kind];
    if (!handler) {
      return printAction(`Error: Unknown command signal '${String(signal.kind)}'`);
    }
    return handler(signal);
  }

  handleUserMessage(text: string): OrchestratorAction {
    const manager = this.#manager;
    if (!manager.chatPath) {
      return printAction(NO_CHAT_OPEN_MESSAGE);
    }
    if (hasPendingError(manager.chat) && !manager.retry.active && !manager.secret.active) {
      return printAction(pendingErrorGuidance());
    }
    if (manager.secret.active) {
      return this.#handleSecretMessage(text);
    }
    if (manager.retry.active) {
      return this.#handleRetryMessage(text);
    }
    return this.#handleNormalMessage(text, manager.chatPath);
  }

  handleAiResponse(text: string, context: ResponseContext, citations?: Citation[]): OrchestratorAction {
    const manager = this.#manager;
    if (context.mode === "retry") {
      if (context.userInput && context.assistantId) {
        manager.addRetryAttempt(context.userInput, text, context.assistantId, citations);
      }
      return continueAction();
    }

    if (context.mode === "secret") {
      if (context.assistantId) {
        manager.releaseReferenceId(context.assistantId);
      }
      return continueAction();
    }

    const transition = buildTransitionState(context.mode, context);
    if (!canMutateNormalChat(transition) || !context.chatPath || !context.chatData) {
      return printAction("\nError: chat context missing for normal-mode response.");
    }
    const chat = context.chatData;
    const message = addAssistantMessage(chat, text, manager.currentModel, citations);
    if (context.assistantId) {
      message.referenceId = context.assistantId;
    } else {
      manager.assignMessageReferenceId(chat.messages.length - 1, chat);
    }
    manager.saveCurrentChat(context.chatPath, chat);
    return continueAction();
  }

  handleAiError(error: unknown, context: ResponseContext): PrintAction {
    const manager = this.#manager;
    const sanitized = sanitizeErrorMessage(summarizeError(error));
    const transition = buildTransitionState(context.mode, context);

    if (context.mode === "normal") {
      const chat = context.chatData;
      if (!canMutateNormalChat(transition) || !context.chatPath || !chat) {
        return printAction(`\nError: ${sanitized}`);
      }
      if (context.assistantId && shouldReleaseForError(transition)) {
        manager.releaseReferenceId(context.assistantId);
      }
      if (hasTrailingUserMessage(chat)) {
        manager.popMessage(-1, chat);
      }
      addErrorMessage(chat, sanitized, {
        provider: manager.currentProvider,
        model: manager.currentModel,
      });
      manager.assignMessageReferenceId(chat.messages.length - 1, chat);
      manager.saveCurrentChat(context.chatPath, chat);
    } else if (context.assistantId && shouldReleaseForError(transition)) {
      manager.releaseReferenceId(context.assistantId);
    }

    return printAction(`\nError: ${sanitized}`);
  }

  handleUserCancel(context: ResponseContext): PrintAction {
    const manager = this.#manager;
    const transition = buildTransitionState(context.mode, context);

    if (context.mode === "normal") {
      const chat = context.chatData;
      if (canMutateNormalChat(transition) && context.chatPath && chat) {
        if (context.assistantId && shouldReleaseForCancel(transition)) {
          manager.releaseReferenceId(context.assistantId);
        }
        if (hasTrailingUserMessage(chat)) {
          manager.popMessage(-1, chat);
        }
        manager.saveCurrentChat(context.chatPath, chat);
      }
    } else if (context.assistantId && shouldReleaseForCancel(transition)) {
      manager.releaseReferenceId(context.assistantId);
    }

    return printAction("\n[Message cancelled]");
  }

  /** Undo what message entry did when the send never started. Returns true when the chat was rolled back. */
  rollbackPreSendFailure(context: ResponseContext): boolean {
    const transition = buildTransitionState(context.mode, context);
    if (context.assistantId && shouldReleaseForRollback(transition)) {
      this.#manager.releaseReferenceId(context.assistantId);
    }
    if (!shouldRollbackPreSend(transition, context.chatData) || !context.chatPath || !context.chatData) {
      return false;
    }
    this.#manager.popMessage(-1, context.chatData);
    this.#manager.saveCurrentChat(context.chatPath, context.chatData);
    return true;
  }

  #handleSecretMessage(text: string): OrchestratorAction {
    const messages = [...getMessagesForModel(this.#manager.chat), newUserMessage(text)];
    return {
      kind: "send",
      mode: "secret",
      messages,
      userInput: text,
      assistantId: this.#manager.reserveReferenceId(),
    };
  }

  #handleRetryMessage(text: string): OrchestratorAction {
    let context: ChatMessage[];
    try {
      context = this.#manager.retry.getContext();
    } catch (error) {
      if (!(error instanceof ModeInactiveError)) {
        throw error;
      }
      this.#manager.retry.clear();
      return printAction(RETRY_STATE_CLEARED_MESSAGE);
    }
    return {
      kind: "send",
      mode: "retry",
      messages: [...context, newUserMessage(text)],
      userInput: text,
      assistantId: this.#manager.reserveReferenceId(),
    };
  }

  #handleNormalMessage(text: string, chatPath: string): OrchestratorAction {
    const manager = this.#manager;
    const chat = manager.chat;
    addUserMessage(chat, text);
    manager.assignMessageReferenceId(chat.messages.length - 1, chat);
    manager.saveCurrentChat(chatPath, chat);
    return {
      kind: "send",
      mode: "normal",
      messages: getMessagesForModel(chat),
      chatPath,
      chatData: chat,
    };
  }

  #handleApplyRetry(retryId: string): OrchestratorAction {
    const manager = this.#manager;
    if (!retryId) {
      return printAction("Retry ID not found");
    }
    if (!manager.retry.active) {
      return printAction("Not in retry mode");
    }
    const chatPath = manager.chatPath;
    if (!chatPath) {
      return printAction("No chat open");
    }
    const attempt = manager.retry.getAttempt(retryId);
    if (!attempt) {
      return printAction(`Retry ID not found: ${retryId}`);
    }

    const chat = manager.chat;
    const targetIndex = manager.retry.targetIndex;
    if (targetIndex === null || targetIndex < 0 || targetIndex >= chat.messages.length) {
      return printAction("Retry target is no longer valid");
    }

    const plan = buildRetryReplacementPlan(chat.messages, targetIndex, attempt, manager.currentModel);
    applyRetryReplacementPlan(chat.messages, plan);
    manager.retry.exit();
    // Positions that had no id before the splice get a fresh one.
    for (let index = plan.replaceStart; index < plan.replaceStart + plan.replacement.length; index += 1) {
      if (!chat.messages[index]?.referenceId) {
        manager.assignMessageReferenceId(index, chat);
      }
    }
    manager.saveCurrentChat(chatPath, chat);
    return printAction(`Applied retry [${retryId}]`);
  }

  #handleCancelRetry(): OrchestratorAction {
    if (!this.#manager.retry.active) {
      return printAction("Not in retry mode");
    }
    this.#manager.retry.exit();
    return printAction("Cancelled retry mode");
  }

  #handleClearSecret(): OrchestratorAction {
    if (this.#manager.secret.active) {
      this.#manager.secret.exit();
      return printAction("Secret mode disabled");
    }
    return continueAction();
  }

  #saveOutgoingChat(): { chatPath: string | null; chat: ChatDocument } {
    const chatPath = this.#manager.chatPath;
    const chat = this.#manager.chat;
    if (chatPath) {
      this.#manager.saveCurrentChat(chatPath, chat);
    }
    return { chatPath, chat };
  }

  #handleNewChat(chatPath: string): OrchestratorAction {
    const previous = this.#saveOutgoingChat();
    const chat = this.#manager.store.load(chatPath);
    this.#manager.switchChat(chatPath, chat);
    this.#manager.saveCurrentChat(chatPath, chat);
    this.#log.log("chat_switch", {
      chat_file: chatPath,
      trigger: "new",
      previous_chat_file: previous.chatPath,
      message_count: chat.messages.length,
    });
    return continueAction(`Created and opened new chat: ${chatPath}`);
  }

  #handleOpenChat(chatPath: string): OrchestratorAction {
    const previous = this.#saveOutgoingChat();
    const chat = this.#manager.store.load(chatPath);
    this.#manager.switchChat(chatPath, chat);
    this.#log.log("chat_switch", {
      chat_file: chatPath,
      trigger: "open",
      previous_chat_file: previous.chatPath,
      message_count: chat.messages.length,
    });
    return continueAction(`Opened chat: ${chatPath}`);
  }

  #handleCloseChat(): OrchestratorAction {
    const previous = this.#saveOutgoingChat();
    this.#manager.closeChat();
    this.#log.log("chat_close", {
      chat_file: previous.chatPath,
      message_count: previous.chat.messages.length,
    });
    return continueAction("Chat closed");
  }

  #handleRenameCurrent(chatPath: string): OrchestratorAction {
    const oldChatPath = this.#manager.chatPath;
    this.#manager.setChatPath(chatPath);
    this.#log.log("chat_rename", { old_chat_file: oldChatPath, new_chat_file: chatPath });
    return continueAction(`Renamed to: ${chatPath}`);
  }

  /** The file is already gone, so the outgoing chat is dropped rather than saved. */
  #handleDeleteCurrent(filename: string): OrchestratorAction {
    const chatPath = this.#manager.chatPath;
    this.#manager.closeChat();
    this.#log.log("chat_delete", { chat_file: chatPath });
    return continueAction(`Deleted: ${filename}`);
  }
}
