import { resolveApiKey, type RuntimeProfile } from "../config.js";
import { isProviderName, providerSupportsSearch, searchSupportedProviders } from "../models.js";
import { GeminiGateway } from "./gemini.js";
import { OpenAiCompatibleGateway, supportsOpenAiCompatibleProvider } from "./openai-compatible.js";
import type { ProviderCache } from "./provider-cache.js";
import type { ProviderGateway } from "./types.js";

export { ProviderCache } from "./provider-cache.js";
export type {
  ProviderFullResponse,
  ProviderGateway,
  ProviderGatewayFactory,
  ProviderRequest,
  ProviderStream,
} from "./types.js";

export function createProviderGateway(provider: string, apiKey: string, timeoutSeconds: number): ProviderGateway {
  if (provider === "gemini") {
    return new GeminiGateway(apiKey, timeoutSeconds);
  }
  if (supportsOpenAiCompatibleProvider(provider)) {
    return new OpenAiCompatibleGateway(provider, apiKey, timeoutSeconds);
  }
  throw new Error(`Unknown provider: ${provider}`);
}

export type ProviderResolution =
  | { ok: true; gateway: ProviderGateway }
  | { ok: false; error: string };

/** Resolve a gateway for `provider`, or explain why a request cannot be sent. */
export function validateAndGetProvider(params: {
  provider: string;
  profile: RuntimeProfile;
  timeoutSeconds: number;
  cache: ProviderCache;
  search?: boolean;
}): ProviderResolution {
  if (!isProviderName(params.provider)) {
    return { ok: false, error: `Unknown provider: ${params.provider}` };
  }
  const apiKey = resolveApiKey(params.profile, params.provider);
  if (!apiKey) {
    return { ok: false, error: `No API key configured for ${params.provider}` };
  }
  if (params.search && !providerSupportsSearch(params.provider)) {
    return {
      ok: false,
      error: `Search not supported for ${params.provider}. Supported: ${searchSupportedProviders().join(", ")}`,
    };
  }
  try {
    return { ok: true, gateway: params.cache.getOrCreate(params.provider, apiKey, params.timeoutSeconds) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
