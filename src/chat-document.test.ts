import { describe, expect, it } from "vitest";
import type { ChatMessage } from "./chat-types.js";
import {
  addErrorMessage,
  addUserMessage,
  createEmptyChat,
  deleteMessageAndFollowing,
  getMessagesForModel,
  getRetryContextForLastInteraction,
  hasPendingError,
  parseChatDocument,
  resolveLastInteractionSpan,
  serializeChatDocument,
  textToLines,
} from "./chat-document.js";
import { ChatDocumentError } from "./errors.js";

function turn(role: ChatMessage["role"], text: string): ChatMessage {
  return { role, content: [text] };
}

describe("textToLines", () => {
  it("splits on newlines and trims blank lines at the edges only", () => {
    expect(textToLines("\n\nfirst\n\nsecond\n  \n")).toEqual(["first", "", "second"]);
    expect(textToLines("   \n")).toEqual([]);
  });
});

describe("parseChatDocument", () => {
  it("reads the persisted shape and keeps unknown keys", () => {
    const chat = parseChatDocument({
      metadata: { title: "Trip", summary: null, system_prompt: "/prompts/a.md", created_utc: "2026-01-01T00:00:00Z", theme: "dark" },
      messages: [
        { timestamp_utc: "2026-01-01T00:00:00Z", role: "user", content: "hello\nthere", mood: "curious" },
        {
          role: "assistant",
          content: ["hi"],
          model: "gpt-4o",
          citations: [{ number: 1, title: "Doc", url: "https://example.com" }, "junk"],
        },
        { role: "error", content: ["Timed out"], details: { provider: "openai" }, hex_id: "abc" },
      ],
    });

    expect(chat.metadata.title).toBe("Trip");
    expect(chat.metadata.systemPrompt).toBe("/prompts/a.md");
    expect(chat.metadata.extras).toEqual({ theme: "dark" });
    expect(chat.messages[0]).toEqual({
      role: "user",
      content: ["hello", "there"],
      timestamp: "2026-01-01T00:00:00Z",
      extras: { mood: "curious" },
    });
    expect(chat.messages[1]?.citations).toEqual([{ number: 1, title: "Doc", url: "https://example.com" }]);
    expect(chat.messages[2]?.details).toEqual({ provider: "openai" });
    expect(chat.messages[2]?.referenceId).toBeUndefined();
  });

  it("rejects malformed documents", () => {
    expect(() => parseChatDocument([])).toThrow(ChatDocumentError);
    expect(() => parseChatDocument({ messages: {} })).toThrow("Invalid chat messages: expected list");
    expect(() => parseChatDocument({ messages: [{ role: "user" }] })).toThrow(
      "Invalid chat message at index 0: missing content",
    );
    expect(() => parseChatDocument({ messages: [{ role: "system", content: [] }] })).toThrow(
      "Invalid chat message at index 0: unknown role",
    );
  });
});

describe("serializeChatDocument", () => {
  it("never writes reference ids", () => {
    const chat = createEmptyChat();
    const message = addUserMessage(chat, "hello");
    message.referenceId = "abc";

    const payload = JSON.stringify(serializeChatDocument(chat));

    expect(payload).not.toContain("abc");
    expect(payload).not.toContain("reference");
  });

  it("writes extras back alongside known keys", () => {
    const chat = parseChatDocument({
      metadata: { theme: "dark" },
      messages: [{ role: "user", content: ["x"], mood: "calm" }],
    });

    const payload = serializeChatDocument(chat);

    expect(payload.metadata).toEqual({
      title: null,
      summary: null,
      system_prompt: null,
      created_utc: null,
      updated_utc: null,
      theme: "dark",
    });
    expect(payload.messages).toEqual([{ timestamp_utc: null, role: "user", content: ["x"], mood: "calm" }]);
  });
});

describe("model context and pending errors", () => {
  it("drops error messages from the model context", () => {
    const chat = createEmptyChat();
    chat.messages.push(turn("user", "a"), turn("assistant", "b"), turn("error", "boom"));

    expect(getMessagesForModel(chat).map((m) => m.content[0])).toEqual(["a", "b"]);
    expect(hasPendingError(chat)).toBe(true);
  });

  it("reports no pending error once a later turn follows", () => {
    const chat = createEmptyChat();
    addErrorMessage(chat, "boom");
    addUserMessage(chat, "again");

    expect(hasPendingError(chat)).toBe(false);
  });
});

describe("resolveLastInteractionSpan", () => {
  it("covers a trailing user/assistant pair", () => {
    const messages = [turn("user", "a"), turn("assistant", "b"), turn("user", "c"), turn("assistant", "d")];

    expect(resolveLastInteractionSpan(messages)).toEqual({
      kind: "user_assistant",
      replaceStart: 2,
      replaceEnd: 3,
      contextEndExclusive: 2,
    });
  });

  it("covers a trailing user/error pair", () => {
    const messages = [turn("user", "a"), turn("error", "timeout")];

    expect(resolveLastInteractionSpan(messages)).toEqual({
      kind: "user_error",
      replaceStart: 0,
      replaceEnd: 1,
      contextEndExclusive: 0,
    });
  });

  it("covers a standalone error", () => {
    const messages = [turn("user", "a"), turn("assistant", "b"), turn("error", "boom")];

    expect(resolveLastInteractionSpan(messages)).toEqual({
      kind: "standalone_error",
      replaceStart: 2,
      replaceEnd: 2,
      contextEndExclusive: 2,
    });
  });

  it("returns null for an empty chat, a trailing user turn, or an orphan assistant", () => {
    expect(resolveLastInteractionSpan([])).toBeNull();
    expect(resolveLastInteractionSpan([turn("user", "a")])).toBeNull();
    expect(resolveLastInteractionSpan([turn("assistant", "a")])).toBeNull();
  });

  it("builds the retry context from what precedes the span", () => {
    const chat = createEmptyChat();
    chat.messages.push(turn("user", "a"), turn("assistant", "b"), turn("user", "c"), turn("error", "timeout"));

    expect(getRetryContextForLastInteraction(chat).map((m) => m.content[0])).toEqual(["a", "b"]);
  });
});

describe("deleteMessageAndFollowing", () => {
  it("removes the tail and reports how many went", () => {
    const chat = createEmptyChat();
    chat.messages.push(turn("user", "a"), turn("assistant", "b"), turn("user", "c"));

    expect(deleteMessageAndFollowing(chat, 1)).toBe(2);
    expect(chat.messages).toHaveLength(1);
    expect(() => deleteMessageAndFollowing(chat, 5)).toThrow(RangeError);
  });
});
