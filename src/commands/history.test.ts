import { describe, expect, it } from "vitest";
import type { ChatMessage } from "../chat-types.js";
import { createCommandHarness, createTestSession, openTestChat, type CommandHarness } from "../testing/fakes.js";

const BORDER = "━".repeat(40);

function harnessWith(messages: Array<[role: ChatMessage["role"], text: string]>, answers: string[] = []): CommandHarness {
  const session = createTestSession();
  session.store.seed("/chats/a.json", messages);
  openTestChat(session, "/chats/a.json");
  return createCommandHarness({ session, answers });
}

function idAt(harness: CommandHarness, index: number): string {
  const id = harness.manager.getMessageReferenceId(index);
  if (!id) {
    throw new Error(`no reference id at ${index}`);
  }
  return id;
}

function unusedId(harness: CommandHarness): string {
  const id = ["fff", "ffe", "ffd", "ffc", "ffb"].find((candidate) => !harness.manager.referenceIds.has(candidate));
  if (!id) {
    throw new Error("no unused id");
  }
  return id;
}

describe("/history", () => {
  const turns: Array<[ChatMessage["role"], string]> = [
    ["user", "q1"],
    ["assistant", "a1"],
    ["user", "q2"],
    ["error", "boom"],
  ];

  it("lists recent messages with their ids", async () => {
    const harness = harnessWith(turns);
    const [u1, a1, u2, e1] = [0, 1, 2, 3].map((index) => idAt(harness, index));

    await expect(harness.run("/history")).resolves.toBe(
      [
        "Chat History (showing 4 of 4 messages)",
        BORDER,
        `[${u1}] User: q1`,
        `[${a1}] Assistant: a1`,
        `[${u2}] User: q2`,
        `[${e1}] Error: boom`,
        BORDER,
      ].join("\n"),
    );
    await expect(harness.run("/history 1")).resolves.toBe(
      ["Chat History (showing 1 of 4 messages)", BORDER, `[${e1}] Error: boom`, BORDER].join("\n"),
    );
    await expect(harness.run("/history errors")).resolves.toBe(
      ["Error Messages (1 of 4 total messages)", BORDER, `[${e1}] Error: boom`, BORDER].join("\n"),
    );
  });

  it("rejects bad limits", async () => {
    const harness = harnessWith(turns);

    await expect(harness.run("/history x")).resolves.toBe("Invalid argument: x. Use a number, 'all', or 'errors'");
    await expect(harness.run("/history 0")).resolves.toBe("Invalid number. Use a positive integer.");
  });

  it("reports an empty chat and a chat without errors", async () => {
    await expect(harnessWith([]).run("/history")).resolves.toBe("No messages in chat history");
    await expect(harnessWith([["user", "q1"]]).run("/history errors")).resolves.toBe("No error messages found");
  });
});

describe("/rewind", () => {
  it("deletes the last user and error pair after confirmation", async () => {
    const harness = harnessWith(
      [
        ["user", "q1"],
        ["assistant", "a1"],
        ["user", "q2"],
        ["error", "boom"],
      ],
      ["yes"],
    );
    const target = idAt(harness, 2);

    await expect(harness.run("/rewind")).resolves.toBe(`Deleted 2 message(s) from [${target}] onwards`);
    expect(harness.interaction.notices).toEqual([`WARNING: Rewind will delete from [${target}] onwards`]);
    expect(harness.interaction.prompts).toEqual(["Type 'yes' to confirm rewind: "]);
    expect(harness.manager.chat.messages.map((message) => message.content[0])).toEqual(["q1", "a1"]);
    expect(harness.manager.referenceIds.has(target)).toBe(false);
    expect(harness.manager.referenceIds.size).toBe(2);
    expect(harness.store.saveCount).toBe(1);
  });

  it("deletes from a chosen id onwards", async () => {
    const harness = harnessWith(
      [
        ["user", "q1"],
        ["assistant", "a1"],
        ["user", "q2"],
        ["assistant", "a2"],
      ],
      ["YES"],
    );
    const target = idAt(harness, 1);

    await expect(harness.run(`/rewind ${target.toUpperCase()}`)).resolves.toBe(
      `Deleted 3 message(s) from [${target}] onwards`,
    );
    expect(harness.manager.chat.messages).toHaveLength(1);
  });

  it("keeps everything unless the answer is yes", async () => {
    const harness = harnessWith(
      [
        ["user", "q1"],
        ["assistant", "a1"],
      ],
      ["y"],
    );

    await expect(harness.run("/rewind last")).resolves.toBe("Rewind cancelled");
    expect(harness.manager.chat.messages).toHaveLength(2);
    expect(harness.store.saveCount).toBe(0);
  });

  it("rejects targets it cannot resolve", async () => {
    const harness = harnessWith([
      ["user", "q1"],
      ["assistant", "a1"],
    ]);
    const missing = unusedId(harness);

    await expect(harness.run("/rewind zz")).rejects.toThrow("Invalid target. Use a reference ID or 'last'");
    await expect(harness.run(`/rewind ${missing}`)).rejects.toThrow(`Reference ID '${missing}' not found`);
    await expect(harnessWith([["user", "q1"]]).run("/rewind")).rejects.toThrow("No complete turn to delete");
    await expect(
      harnessWith([
        ["assistant", "a0"],
        ["user", "q1"],
      ]).run("/rewind"),
    ).rejects.toThrow("Last interaction is not a complete user+assistant or user+error turn");
    await expect(harnessWith([]).run("/rewind")).resolves.toBe("No messages to delete");
  });
});

describe("/purge", () => {
  it("removes the listed messages in order", async () => {
    const harness = harnessWith(
      [
        ["user", "q1"],
        ["assistant", "a1"],
        ["user", "q2"],
        ["assistant", "a2"],
      ],
      ["yes"],
    );
    const first = idAt(harness, 1);
    const second = idAt(harness, 3);

    await expect(harness.run(`/purge ${second} ${first} ${first}`)).resolves.toBe(
      `Purged 2 message(s): [${first}], [${second}]`,
    );
    expect(harness.interaction.notices).toEqual([
      `WARNING: Purging message(s) breaks conversation context: [${first}], [${second}]`,
    ]);
    expect(harness.manager.chat.messages.map((message) => message.content[0])).toEqual(["q1", "q2"]);
    expect(harness.manager.referenceIds.size).toBe(2);
  });

  it("validates its arguments", async () => {
    const harness = harnessWith([["user", "q1"]], ["no"]);
    const id = idAt(harness, 0);

    await expect(harness.run("/purge")).resolves.toBe("Usage: /purge <id> [id2 id3 ...]");
    await expect(harness.run("/purge zz")).resolves.toBe("Invalid reference ID: zz");
    await expect(harness.run(`/purge ${id}`)).resolves.toBe("Purge cancelled");
    expect(harness.manager.chat.messages).toHaveLength(1);
  });
});

describe("/show", () => {
  it("prints one message with its citations", async () => {
    const harness = harnessWith([
      ["user", "q1"],
      ["assistant", "line one\nline two"],
    ]);
    const id = idAt(harness, 1);
    const message = harness.manager.chat.messages[1];
    if (message) {
      message.model = "gpt-4o";
      message.citations = [{ title: "Doc", url: "https://example.com" }, { url: "https://example.org" }];
    }

    await expect(harness.run(`/show ${id}`)).resolves.toBe(
      [
        `Message [${id}] | Assistant | gpt-4o | unknown`,
        BORDER,
        "line one\nline two",
        BORDER,
        "[1] Doc https://example.com",
        "[2] https://example.org",
      ].join("\n"),
    );
    await expect(harness.run("/show")).resolves.toBe("Usage: /show <id>");
    await expect(harness.run("/show zz")).resolves.toBe("Invalid reference ID: zz");
  });
});

describe("/status", () => {
  it("summarizes the session", async () => {
    const harness = harnessWith([["user", "q1"]]);
    harness.manager.chat.metadata.title = "Trip plans";

    const result = await harness.run("/status");

    expect(typeof result).toBe("string");
    const lines = String(result).split("\n");
    expect(lines[0]).toBe("Session Status");
    expect(lines).toContain("Chats:     /chats");
    expect(lines).toContain("Chat:      /chats/a.json");
    expect(lines).toContain("Title:     Trip plans");
    expect(lines).toContain("Messages:  1");
    expect(lines).toContain("Assistant: openai | gpt-4o");
    expect(lines).toContain("Input:     quick");
    expect(lines).toContain("Retry:     OFF");
    expect(lines).toContain("Timeout:   300 seconds");
  });
});
