import fs from "node:fs";
import path from "node:path";
import type { DebugEvent } from "./chat-types.js";
import { sanitizeErrorMessage } from "./sanitize.js";

export type EventFields = Record<string, string | number | boolean | null | undefined>;

export type EventLog = {
  readonly filePath: string | null;
  log(event: string, fields?: EventFields): void;
};

/** JSON Lines event log. A null path yields a logger that drops everything. */
export function createEventLog(filePath: string | null): EventLog {
  if (!filePath) {
    return { filePath: null, log: () => {} };
  }

  let dirReady = false;
  return {
    filePath,
    log(event, fields = {}) {
      const record: Record<string, unknown> = { ts: new Date().toISOString(), event };
      for (const [key, value] of Object.entries(fields)) {
        if (value === undefined) {
          continue;
        }
        record[key] = typeof value === "string" ? sanitizeErrorMessage(value) : value;
      }
      if (!dirReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        dirReady = true;
      }
      fs.appendFileSync(filePath, `${JSON.stringify(record)}\n`, "utf8");
    },
  };
}

export function buildLogFilePath(logsDir: string, now = new Date()): string {
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  return path.join(logsDir, `chorus-${stamp}.jsonl`);
}

/** Adapt provider `onDebug` callbacks onto the event log. */
export function debugToEventLog(log: EventLog): (event: DebugEvent) => void {
  return (event) => {
    log.log("provider_debug", {
      stage: event.stage,
      data: safeStringify(event.data),
    });
  };
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return String(value);
  }
}
