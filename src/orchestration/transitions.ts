import type { ChatDocument } from "../chat-types.js";
import type { ActionMode } from "./actions.js";

export type ResponseTransitionState = {
  mode: ActionMode;
  hasChatContext: boolean;
  hasAssistantId: boolean;
};

export function buildTransitionState(
  mode: ActionMode,
  context: {
    chatPath?: string | null;
    chatData?: ChatDocument | null;
    assistantId?: string | null;
  },
): ResponseTransitionState {
  return {
    mode,
    hasChatContext: Boolean(context.chatPath) && Boolean(context.chatData),
    hasAssistantId: Boolean(context.assistantId),
  };
}

export function canMutateNormalChat(state: ResponseTransitionState): boolean {
  return state.mode === "normal" && state.hasChatContext;
}

export function hasTrailingUserMessage(chat: ChatDocument | null | undefined): boolean {
  return chat?.messages.at(-1)?.role === "user";
}

/** Rollback releases whenever an id was reserved. */
export function shouldReleaseForRollback(state: ResponseTransitionState): boolean {
  return state.hasAssistantId;
}

export function shouldReleaseForError(state: ResponseTransitionState): boolean {
  if (state.mode === "normal") {
    return state.hasChatContext && state.hasAssistantId;
  }
  return state.hasAssistantId;
}

export function shouldReleaseForCancel(state: ResponseTransitionState): boolean {
  if (state.mode === "normal") {
    return state.hasChatContext && state.hasAssistantId;
  }
  return state.hasAssistantId;
}

/** A pre-send failure pops the optimistically appended user turn only in normal mode. */
export function shouldRollbackPreSend(state: ResponseTransitionState, chat: ChatDocument | null | undefined): boolean {
  return canMutateNormalChat(state) && hasTrailingUserMessage(chat);
}
