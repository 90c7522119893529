import { describe, expect, it } from "vitest";
import type { ChatMessage } from "./chat-types.js";
import {
  assignReferenceIds,
  buildReferenceIdMap,
  generateReferenceId,
  getMessageIndex,
  getReferenceId,
  isReferenceId,
} from "./reference-ids.js";

function message(role: ChatMessage["role"], text: string, referenceId?: string): ChatMessage {
  return referenceId ? { role, content: [text], referenceId } : { role, content: [text] };
}

describe("generateReferenceId", () => {
  it("returns a lowercase hex id of at least three digits and records it", () => {
    const live = new Set<string>();
    const id = generateReferenceId(live);

    expect(id).toMatch(/^[0-9a-f]{3,}$/);
    expect(live.has(id)).toBe(true);
  });

  it("never returns an id that is already live", () => {
    const live = new Set<string>();
    const ids = assignReferenceIds(500, live);

    expect(new Set(ids).size).toBe(500);
    expect(live.size).toBe(500);
  });

  it("widens once every id at the current width is taken", () => {
    const live = new Set<string>();
    for (let value = 0; value < 16; value += 1) {
      live.add(value.toString(16));
    }

    const id = generateReferenceId(live, 1);

    expect(id).toHaveLength(2);
    expect(live.size).toBe(17);
  });

  it("fills a saturated three-digit space without looping forever", () => {
    const live = new Set<string>();
    for (let value = 0; value < 16 ** 3; value += 1) {
      live.add(value.toString(16).padStart(3, "0"));
    }

    const id = generateReferenceId(live);

    expect(id.length).toBeGreaterThanOrEqual(4);
  });
});

describe("isReferenceId", () => {
  it("accepts hex strings of three or more characters in either case", () => {
    expect(isReferenceId("abc")).toBe(true);
    expect(isReferenceId("A1F9")).toBe(true);
  });

  it("rejects short, empty, spaced and non-hex values", () => {
    expect(isReferenceId("")).toBe(false);
    expect(isReferenceId("ab")).toBe(false);
    expect(isReferenceId("ab c")).toBe(false);
    expect(isReferenceId("xyz")).toBe(false);
    expect(isReferenceId("last")).toBe(false);
  });
});

describe("reference id lookups", () => {
  const messages = [message("user", "hi", "a1b"), message("assistant", "hello"), message("user", "bye", "c2d")];

  it("maps only messages that carry an id", () => {
    expect([...buildReferenceIdMap(messages)]).toEqual([
      [0, "a1b"],
      [2, "c2d"],
    ]);
  });

  it("finds the index for an id, ignoring case and surrounding space", () => {
    expect(getMessageIndex("C2D ", messages)).toBe(2);
    expect(getMessageIndex("a1b", buildReferenceIdMap(messages))).toBe(0);
    expect(getMessageIndex("fff", messages)).toBeNull();
    expect(getMessageIndex("  ", messages)).toBeNull();
  });

  it("returns the id at an index", () => {
    expect(getReferenceId(0, messages)).toBe("a1b");
    expect(getReferenceId(1, messages)).toBeNull();
    expect(getReferenceId(2, buildReferenceIdMap(messages))).toBe("c2d");
    expect(getReferenceId(9, messages)).toBeNull();
  });
});
