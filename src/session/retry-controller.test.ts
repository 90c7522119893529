import { describe, expect, it } from "vitest";
import type { ChatMessage } from "../chat-types.js";
import { ModeConflictError, ModeInactiveError } from "../errors.js";
import { RetryController } from "./retry-controller.js";

const context: ChatMessage[] = [
  { role: "user", content: ["a"] },
  { role: "assistant", content: ["b"] },
];

describe("RetryController", () => {
  it("returns copies of the frozen context", () => {
    const retry = new RetryController(new Set());
    retry.enter(context, 3);

    const copy = retry.getContext();
    copy[0]?.content.push("mutated");

    expect(retry.getContext()[0]?.content).toEqual(["a"]);
    expect(retry.targetIndex).toBe(3);
  });

  it("records attempts under live ids and releases them on exit", () => {
    const live = new Set<string>();
    const retry = new RetryController(live);
    retry.enter(context, 1);

    const first = retry.addAttempt("c", "d");
    const second = retry.addAttempt("c", "e", "f00");

    expect(live.has(first)).toBe(true);
    expect(live.has("f00")).toBe(true);
    expect(retry.attemptIds()).toEqual([first, "f00"]);
    expect(retry.latestAttemptId()).toBe("f00");
    expect(retry.getAttempt(second)).toEqual({ userText: "c", assistantText: "e" });

    retry.exit();

    expect(retry.active).toBe(false);
    expect(live.size).toBe(0);
    expect(retry.latestAttemptId()).toBeNull();
  });

  it("moves a re-added id to the end", () => {
    const retry = new RetryController(new Set());
    retry.enter(context);
    retry.addAttempt("q", "1", "aaa");
    retry.addAttempt("q", "2", "bbb");
    retry.addAttempt("q", "3", "aaa");

    expect(retry.latestAttemptId()).toBe("aaa");
    expect(retry.getAttempt("aaa")?.assistantText).toBe("3");
  });

  it("refuses to work while inactive", () => {
    const retry = new RetryController(new Set());

    expect(() => retry.getContext()).toThrow(ModeInactiveError);
    expect(() => retry.addAttempt("u", "a")).toThrow("Not in retry mode");
  });

  it("refuses to enter while the other mode is active", () => {
    const retry = new RetryController(new Set(), () => true);

    expect(() => retry.enter(context)).toThrow(ModeConflictError);
    expect(retry.active).toBe(false);
  });

  it("drops earlier attempts when entered again", () => {
    const live = new Set<string>();
    const retry = new RetryController(live);
    retry.enter(context);
    retry.addAttempt("u", "a", "abc");

    retry.enter(context);

    expect(retry.attemptCount).toBe(0);
    expect(live.has("abc")).toBe(false);
  });
});
