import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { ChatMessage } from "../chat-types.js";
import { createCommandHarness, createTestSession, openTestChat } from "../testing/fakes.js";
import type { HelperInvoker } from "./types.js";
import { buildHelperPrompt, formatConversationForPrompt, formatMessagesForSafetyCheck } from "./metadata.js";

const BORDER = "━".repeat(40);

function harnessWithChat(helper?: HelperInvoker, messages: Array<[ChatMessage["role"], string]> = defaultTurns()) {
  const session = createTestSession();
  session.store.seed("/chats/a.json", messages);
  openTestChat(session, "/chats/a.json");
  return createCommandHarness({ session, helper });
}

function defaultTurns(): Array<[ChatMessage["role"], string]> {
  return [
    ["user", "Where should we camp?"],
    ["error", "timeout"],
    ["assistant", "By the lake."],
  ];
}

describe("formatConversationForPrompt", () => {
  it("labels each turn", () => {
    expect(
      formatConversationForPrompt([
        { role: "user", content: ["hi", "there"] },
        { role: "assistant", content: ["hello"] },
      ]),
    ).toBe("User: hi\nthere\n\nAssistant: hello");
  });
});

describe("buildHelperPrompt", () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("fills every placeholder in the fallback", () => {
    expect(buildHelperPrompt(null, "A {CONTEXT} B {CONTEXT}", "ctx")).toBe("A ctx B ctx");
  });

  it("appends the conversation to a template file without a placeholder", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "chorus-prompt-"));
    const templatePath = path.join(tempDir, "title.md");
    fs.writeFileSync(templatePath, "Name this chat.\n\n", "utf8");

    expect(buildHelperPrompt(templatePath, "unused", "User: hi")).toBe("Name this chat.\n\nUser: hi");
  });
});

describe("/title", () => {
  it("sets and clears the title by hand", async () => {
    const harness = harnessWithChat();

    await expect(harness.run("/title Lake trip")).resolves.toBe("Title set to: Lake trip");
    expect(harness.manager.chat.metadata.title).toBe("Lake trip");
    await expect(harness.run("/title --")).resolves.toBe("Title cleared");
    expect(harness.manager.chat.metadata.title).toBeNull();
    expect(harness.store.saveCount).toBe(2);
  });

  it("generates a title from the model-visible turns", async () => {
    const harness = harnessWithChat(async () => '  "Camping by the lake"\n');

    await expect(harness.run("/title")).resolves.toBe("Title generated: Camping by the lake");
    expect(harness.manager.chat.metadata.title).toBe("Camping by the lake");
    expect(harness.helperRequests).toHaveLength(1);
    expect(harness.helperRequests[0]?.task).toBe("title_generation");
    expect(harness.helperRequests[0]?.prompt.endsWith("\n\nUser: Where should we camp?\n\nAssistant: By the lake.")).toBe(
      true,
    );
  });

  it("reports helper failures without changing the title", async () => {
    const harness = harnessWithChat(async () => {
      throw new Error("helper offline");
    });

    await expect(harness.run("/title")).resolves.toBe("Error generating title: helper offline");
    expect(harness.manager.chat.metadata.title).toBeNull();
  });

  it("needs messages to generate from", async () => {
    const harness = harnessWithChat(undefined, [["error", "timeout"]]);

    await expect(harness.run("/title")).resolves.toBe("No messages in chat to generate title from");
    expect(harness.helperRequests).toEqual([]);
  });

  it("needs an open chat", async () => {
    await expect(createCommandHarness().run("/title x")).resolves.toBe("No chat is currently open");
  });
});

describe("/summary", () => {
  it("sets, generates and clears the summary", async () => {
    const harness = harnessWithChat(async () => "  They picked the lake.  ");

    await expect(harness.run("/summary Short notes")).resolves.toBe("Summary set");
    expect(harness.manager.chat.metadata.summary).toBe("Short notes");
    await expect(harness.run("/summary")).resolves.toBe("Summary generated:\nThey picked the lake.");
    expect(harness.helperRequests[0]?.task).toBe("summary_generation");
    await expect(harness.run("/summary --")).resolves.toBe("Summary cleared");
    expect(harness.manager.chat.metadata.summary).toBeNull();
  });
});

describe("formatMessagesForSafetyCheck", () => {
  it("keeps the stored role of every turn", () => {
    expect(
      formatMessagesForSafetyCheck([
        { role: "user", content: ["hi"] },
        { role: "error", content: ["boom"] },
      ]),
    ).toBe("user: hi\nerror: boom");
  });
});

describe("/safe", () => {
  it("checks the whole chat, error turns included", async () => {
    const harness = harnessWithChat(async () => "  Nothing unsafe found.\n");

    await expect(harness.run("/safe")).resolves.toBe(
      ["Safety Check Results (entire chat):", BORDER, "Nothing unsafe found.", BORDER].join("\n"),
    );
    expect(harness.helperRequests).toHaveLength(1);
    expect(harness.helperRequests[0]?.task).toBe("safety_check");
    expect(
      harness.helperRequests[0]?.prompt.endsWith("\n\nuser: Where should we camp?\nerror: timeout\nassistant: By the lake."),
    ).toBe(true);
  });

  it("checks a single message by reference id", async () => {
    const harness = harnessWithChat(async () => "Fine.");
    const id = harness.manager.getMessageReferenceId(2) ?? "";

    await expect(harness.run(`/safe ${id.toUpperCase()}`)).resolves.toBe(
      [`Safety Check Results (message [${id}]):`, BORDER, "Fine.", BORDER].join("\n"),
    );
    expect(harness.helperRequests[0]?.prompt.endsWith("\n\nassistant: By the lake.")).toBe(true);
    expect(harness.helperRequests[0]?.prompt).not.toContain("Where should we camp?");
  });

  it("rejects an unknown reference id without calling the helper", async () => {
    const harness = harnessWithChat();

    await expect(harness.run("/safe zzz")).resolves.toBe("Invalid reference ID: zzz");
    expect(harness.helperRequests).toEqual([]);
  });

  it("needs an open chat with messages", async () => {
    await expect(createCommandHarness().run("/safe")).resolves.toBe("No chat is currently open");
    await expect(harnessWithChat(undefined, []).run("/safe")).resolves.toBe("No messages to check");
  });

  it("reports helper failures", async () => {
    const harness = harnessWithChat(async () => {
      throw new Error("helper offline");
    });

    await expect(harness.run("/safe")).resolves.toBe("Error performing safety check: helper offline");
  });
});
