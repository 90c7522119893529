import { describe, expect, it } from "vitest";
import type { ChatMessage } from "../chat-types.js";
import { applyRetryReplacementPlan, buildRetryReplacementPlan, resolveReplaceStart } from "./retry-apply.js";

const NOW = "2026-04-01T00:00:00.000Z";

function turn(role: ChatMessage["role"], text: string, referenceId?: string): ChatMessage {
  return referenceId ? { role, content: [text], referenceId } : { role, content: [text] };
}

describe("resolveReplaceStart", () => {
  it("includes the preceding user turn", () => {
    const messages = [turn("user", "a"), turn("assistant", "b")];

    expect(resolveReplaceStart(messages, 1)).toBe(0);
    expect(resolveReplaceStart(messages, 0)).toBe(0);
    expect(resolveReplaceStart([turn("assistant", "x"), turn("error", "e")], 1)).toBe(1);
  });
});

describe("buildRetryReplacementPlan", () => {
  it("replaces a failed user/error pair with the chosen attempt", () => {
    const messages = [
      turn("user", "a", "a01"),
      turn("assistant", "b", "b02"),
      turn("user", "c", "c03"),
      turn("error", "timeout", "e04"),
    ];

    const plan = buildRetryReplacementPlan(messages, 3, { userText: "c2", assistantText: "d" }, "gpt-4o", () => NOW);
    applyRetryReplacementPlan(messages, plan);

    expect(messages.map((message) => `${message.role}:${message.content.join("\n")}`)).toEqual([
      "user:a",
      "assistant:b",
      "user:c2",
      "assistant:d",
    ]);
    expect(messages[2]).toEqual({ role: "user", content: ["c2"], timestamp: NOW, referenceId: "c03" });
    expect(messages[3]).toEqual({ role: "assistant", content: ["d"], timestamp: NOW, model: "gpt-4o", referenceId: "e04" });
  });

  it("replaces only the target when it stands alone", () => {
    const messages = [turn("user", "a"), turn("assistant", "b"), turn("error", "boom", "e01")];

    const plan = buildRetryReplacementPlan(
      messages,
      2,
      { userText: "again", assistantText: "fine", citations: [{ number: 1, url: "https://example.com" }] },
      "gpt-4o",
      () => NOW,
    );

    expect(plan.replaceStart).toBe(2);
    expect(plan.replaceEnd).toBe(2);
    expect(plan.replacement[0].referenceId).toBeUndefined();
    expect(plan.replacement[1].citations).toEqual([{ number: 1, url: "https://example.com" }]);

    applyRetryReplacementPlan(messages, plan);
    expect(messages).toHaveLength(4);
  });

  it("rejects a target outside the chat", () => {
    expect(() => buildRetryReplacementPlan([], 0, { userText: "u", assistantText: "a" }, "m")).toThrow(
      "Retry target is no longer valid",
    );
  });
});
