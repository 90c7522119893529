import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { buildLogFilePath, createEventLog, debugToEventLog } from "./event-log.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function readEvents(filePath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(filePath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

describe("createEventLog", () => {
  it("appends one JSON object per event and creates the directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chorus-log-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "nested", "events.jsonl");
    const log = createEventLog(filePath);

    log.log("session_start", { provider: "openai", model: "gpt-4o", chat_file: null });
    log.log("ai_error", { error: "bad key sk-test-secret-value", skipped: undefined, latency_ms: 12 });

    const events = readEvents(filePath);
    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({ event: "session_start", provider: "openai", model: "gpt-4o", chat_file: null });
    expect(typeof events[0]?.ts).toBe("string");
    expect(events[1]).toMatchObject({ event: "ai_error", error: "bad key [REDACTED_API_KEY]", latency_ms: 12 });
    expect(events[1]).not.toHaveProperty("skipped");
  });

  it("does nothing without a file", () => {
    const log = createEventLog(null);

    expect(log.filePath).toBeNull();
    expect(() => log.log("command", { name: "help" })).not.toThrow();
  });

  it("turns provider debug callbacks into events", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chorus-log-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "events.jsonl");

    debugToEventLog(createEventLog(filePath))({ stage: "retry", data: { attempt: 2 } });

    expect(readEvents(filePath)[0]).toMatchObject({ event: "provider_debug", stage: "retry", data: '{"attempt":2}' });
  });
});

describe("buildLogFilePath", () => {
  it("names the file after the timestamp", () => {
    const filePath = buildLogFilePath("/logs", new Date("2026-05-06T07:08:09.010Z"));

    expect(filePath).toBe(path.join("/logs", "chorus-2026-05-06T07-08-09-010Z.jsonl"));
  });
});
