import fs from "node:fs";
import path from "node:path";
import { resolvePath } from "../config.js";

export type LoadedSystemPrompt = {
  content: string | null;
  path: string | null;
  warning: string | null;
};

/**
 * A profile `system_prompt` is either a file path (resolved against the
 * profile directory) or the prompt text itself.
 */
export function loadSystemPrompt(value: string | null, baseDir: string): LoadedSystemPrompt {
  if (!value || !value.trim()) {
    return { content: null, path: null, warning: null };
  }
  if (!looksLikePath(value)) {
    return { content: value.trim(), path: null, warning: null };
  }
  const resolved = resolvePath(value.trim(), baseDir);
  try {
    return { content: fs.readFileSync(resolved, "utf8").trim(), path: resolved, warning: null };
  } catch {
    return { content: null, path: null, warning: `Could not load system prompt from ${resolved}` };
  }
}

export function readSystemPromptFile(promptPath: string, baseDir: string): { content: string; path: string } {
  const resolved = resolvePath(promptPath.trim(), baseDir);
  if (!fs.existsSync(resolved)) {
    throw new Error(`System prompt file not found: ${resolved}`);
  }
  return { content: fs.readFileSync(resolved, "utf8").trim(), path: resolved };
}

function looksLikePath(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed.includes("\n")) {
    return false;
  }
  return (
    trimmed.startsWith("~") ||
    trimmed.startsWith(".") ||
    path.isAbsolute(trimmed) ||
    /\.(txt|md)$/i.test(trimmed)
  );
}
