import type { ChatDocument } from "../chat-types.js";
import { createEmptyChat } from "../chat-document.js";
import type { InputMode, RuntimeProfile } from "../config.js";
import { ProviderCache } from "../providers/provider-cache.js";
import type { ProviderGatewayFactory } from "../providers/types.js";
import { RetryController } from "./retry-controller.js";
import { SecretController } from "./secret-controller.js";

export type SessionState = {
  currentProvider: string;
  currentModel: string;
  helperProvider: string;
  helperModel: string;
  profile: RuntimeProfile;
  profilePath: string | null;
  chat: ChatDocument;
  chatPath: string | null;
  logFile: string | null;
  systemPrompt: string | null;
  systemPromptPath: string | null;
  inputMode: InputMode;
  searchMode: boolean;
  timeoutSeconds: number;
  readonly liveIds: Set<string>;
  readonly retry: RetryController;
  readonly secret: SecretController;
  readonly providerCache: ProviderCache;
};

export function createSessionState(params: {
  profile: RuntimeProfile;
  profilePath?: string | null;
  currentProvider?: string;
  currentModel?: string;
  helperProvider?: string;
  helperModel?: string;
  systemPrompt?: string | null;
  systemPromptPath?: string | null;
  logFile?: string | null;
  gatewayFactory: ProviderGatewayFactory;
}): SessionState {
  const profile = params.profile;
  const currentProvider = params.currentProvider ?? profile.defaultAi;
  const currentModel = params.currentModel ?? profile.models[currentProvider] ?? "";
  const helperProvider = params.helperProvider ?? profile.defaultHelperAi ?? currentProvider;
  const helperModel = params.helperModel ?? profile.models[helperProvider] ?? currentModel;

  const liveIds = new Set<string>();
  // The controllers check each other lazily, so build them through a holder.
  const controllers: { retry: RetryController | null; secret: SecretController | null } = {
    retry: null,
    secret: null,
  };
  const secret = new SecretController(() => controllers.retry?.active ?? false);
  const retry = new RetryController(liveIds, () => controllers.secret?.active ?? false);
  controllers.retry = retry;
  controllers.secret = secret;

  return {
    currentProvider,
    currentModel,
    helperProvider,
    helperModel,
    profile,
    profilePath: params.profilePath ?? null,
    chat: createEmptyChat(),
    chatPath: null,
    logFile: params.logFile ?? null,
    systemPrompt: params.systemPrompt ?? null,
    systemPromptPath: params.systemPromptPath ?? null,
    inputMode: profile.inputMode,
    searchMode: false,
    timeoutSeconds: profile.timeout,
    liveIds,
    retry,
    secret,
    providerCache: new ProviderCache(params.gatewayFactory),
  };
}

export function pendingErrorGuidance(compact = false): string {
  if (compact) {
    return "[⚠️ PENDING ERROR - Use /retry or /rewind]";
  }
  return (
    "⚠️ Cannot continue: last interaction failed.\n" +
    "Use /retry to rerun the same message.\n" +
    "Use /rewind to remove the failed error/turn."
  );
}
