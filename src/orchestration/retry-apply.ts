import type { ChatMessage, RetryAttempt } from "../chat-types.js";
import { textToLines, utcNow } from "../chat-document.js";

export type RetryReplacementPlan = {
  replaceStart: number;
  replaceEnd: number;
  replacement: [ChatMessage, ChatMessage];
};

/** The slice starts one earlier when the retried message follows a user turn. */
export function resolveReplaceStart(messages: readonly ChatMessage[], targetIndex: number): number {
  if (targetIndex > 0 && messages[targetIndex - 1]?.role === "user") {
    return targetIndex - 1;
  }
  return targetIndex;
}

export function buildRetryReplacementPlan(
  messages: readonly ChatMessage[],
  targetIndex: number,
  attempt: RetryAttempt,
  model: string,
  now: () => string = utcNow,
): RetryReplacementPlan {
  const target = messages[targetIndex];
  if (!target) {
    throw new RangeError("Retry target is no longer valid");
  }
  const replaceStart = resolveReplaceStart(messages, targetIndex);
  const existingUserId = replaceStart !== targetIndex ? messages[replaceStart]?.referenceId : undefined;

  const user: ChatMessage = {
    role: "user",
    content: textToLines(attempt.userText),
    timestamp: now(),
  };
  if (existingUserId) {
    user.referenceId = existingUserId;
  }

  const assistant: ChatMessage = {
    role: "assistant",
    content: textToLines(attempt.assistantText),
    timestamp: now(),
    model,
  };
  if (attempt.citations && attempt.citations.length > 0) {
    assistant.citations = attempt.citations;
  }
  if (target.referenceId) {
    assistant.referenceId = target.referenceId;
  }

  return { replaceStart, replaceEnd: targetIndex, replacement: [user, assistant] };
}

/** Splice the plan into `messages` in place. */
export function applyRetryReplacementPlan(messages: ChatMessage[], plan: RetryReplacementPlan): ChatMessage[] {
  return messages.splice(plan.replaceStart, plan.replaceEnd - plan.replaceStart + 1, ...plan.replacement);
}
