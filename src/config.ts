import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { isRecord } from "./chat-document.js";
import { ProfileError } from "./errors.js";

export type InputMode = "quick" | "compose";

export type ApiKeyConfig =
  | { type: "env"; key: string }
  | { type: "direct"; value: string };

export type OutputLimits = {
  maxOutputTokens?: number;
};

export type AiLimits = {
  default?: OutputLimits;
  providers?: Record<string, OutputLimits>;
};

export type RuntimeProfile = {
  defaultAi: string;
  defaultHelperAi: string | null;
  models: Record<string, string>;
  timeout: number;
  inputMode: InputMode;
  systemPrompt: string | null;
  titlePrompt: string | null;
  summaryPrompt: string | null;
  safetyPrompt: string | null;
  chatsDir: string;
  logsDir: string;
  apiKeys: Record<string, ApiKeyConfig>;
  aiLimits: AiLimits | null;
};

export const chorusConfig = {
  defaultTimeoutSeconds: 300,
  defaultInputMode: "quick" satisfies InputMode,
  profileEnvVar: "CHORUS_PROFILE",
  homeEnvVar: "CHORUS_HOME",
} as const;

export function getChorusDataDir(): string {
  const override = process.env[chorusConfig.homeEnvVar]?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), ".chorus");
}

export function resolveProfilePath(explicit?: string): string {
  const candidate = explicit?.trim() || process.env[chorusConfig.profileEnvVar]?.trim();
  if (candidate) {
    return path.resolve(expandHomePath(candidate));
  }
  return path.join(getChorusDataDir(), "profile.json");
}

export function loadProfile(profilePath: string): RuntimeProfile {
  if (!fs.existsSync(profilePath)) {
    throw new ProfileError(`Profile not found: ${profilePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(profilePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProfileError(`Invalid JSON in profile: ${reason}`);
  }
  return parseProfile(raw, path.dirname(path.resolve(profilePath)));
}

export function parseProfile(raw: unknown, baseDir: string): RuntimeProfile {
  if (!isRecord(raw)) {
    throw new ProfileError("Profile must be a JSON object");
  }

  const missing = ["default_ai", "models"].filter((key) => !(key in raw));
  if (missing.length > 0) {
    throw new ProfileError(`Profile missing required fields: ${missing.join(", ")}`);
  }

  if (!isRecord(raw.models)) {
    throw new ProfileError("'models' must be an object");
  }
  const models: Record<string, string> = {};
  for (const [provider, model] of Object.entries(raw.models)) {
    models[provider] = String(model);
  }

  const defaultAi = String(raw.default_ai);
  if (!models[defaultAi]) {
    throw new ProfileError(`No model configured for default_ai '${defaultAi}'`);
  }

  const timeout = raw.timeout ?? chorusConfig.defaultTimeoutSeconds;
  if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout < 0) {
    throw new ProfileError("'timeout' must be a number");
  }

  const inputMode = raw.input_mode ?? chorusConfig.defaultInputMode;
  if (inputMode !== "quick" && inputMode !== "compose") {
    throw new ProfileError("'input_mode' must be 'quick' or 'compose'");
  }

  const dataDir = getChorusDataDir();
  return {
    defaultAi,
    defaultHelperAi: readOptionalString(raw.default_helper_ai),
    models,
    timeout,
    inputMode,
    systemPrompt: readOptionalString(raw.system_prompt),
    titlePrompt: resolveOptionalPath(readOptionalString(raw.title_prompt), baseDir),
    summaryPrompt: resolveOptionalPath(readOptionalString(raw.summary_prompt), baseDir),
    safetyPrompt: resolveOptionalPath(readOptionalString(raw.safety_prompt), baseDir),
    chatsDir: resolvePath(readOptionalString(raw.chats_dir) ?? path.join(dataDir, "chats"), baseDir),
    logsDir: resolvePath(readOptionalString(raw.logs_dir) ?? path.join(dataDir, "logs"), baseDir),
    apiKeys: parseApiKeys(raw.api_keys),
    aiLimits: parseAiLimits(raw.ai_limits),
  };
}

export function resolveApiKey(profile: RuntimeProfile, provider: string): string | null {
  const config = profile.apiKeys[provider];
  if (!config) {
    return null;
  }
  const value = config.type === "env" ? process.env[config.key] : config.value;
  const trimmed = value?.trim() ?? "";
  return trimmed || null;
}

export function resolveMaxOutputTokens(profile: RuntimeProfile, provider: string): number | undefined {
  const limits = profile.aiLimits;
  if (!limits) {
    return undefined;
  }
  return limits.providers?.[provider]?.maxOutputTokens ?? limits.default?.maxOutputTokens;
}

/** Resolve `~` and profile-relative paths. */
export function resolvePath(value: string, baseDir: string): string {
  return path.resolve(baseDir, expandHomePath(value));
}

export function expandHomePath(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

function resolveOptionalPath(value: string | null, baseDir: string): string | null {
  return value ? resolvePath(value, baseDir) : null;
}

function parseApiKeys(raw: unknown): Record<string, ApiKeyConfig> {
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ProfileError("'api_keys' must be an object");
  }
  const keys: Record<string, ApiKeyConfig> = {};
  for (const [provider, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) {
      throw new ProfileError(`API key config for '${provider}' must be an object`);
    }
    if (entry.type === "env" && typeof entry.key === "string") {
      keys[provider] = { type: "env", key: entry.key };
    } else if (entry.type === "direct" && typeof entry.value === "string") {
      keys[provider] = { type: "direct", value: entry.value };
    } else {
      throw new ProfileError(`API key config for '${provider}' must be {type: "env", key} or {type: "direct", value}`);
    }
  }
  return keys;
}

function parseAiLimits(raw: unknown): AiLimits | null {
  if (!isRecord(raw)) {
    return null;
  }
  const limits: AiLimits = {};
  const defaults = parseOutputLimits(raw.default);
  if (defaults) {
    limits.default = defaults;
  }
  if (isRecord(raw.providers)) {
    const providers: Record<string, OutputLimits> = {};
    for (const [provider, value] of Object.entries(raw.providers)) {
      const parsed = parseOutputLimits(value);
      if (parsed) {
        providers[provider] = parsed;
      }
    }
    limits.providers = providers;
  }
  return limits;
}

function parseOutputLimits(raw: unknown): OutputLimits | null {
  if (!isRecord(raw)) {
    return null;
  }
  const value = raw.max_output_tokens;
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return { maxOutputTokens: value };
  }
  return {};
}

function readOptionalString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value : null;
}
