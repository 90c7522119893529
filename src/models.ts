export type ProviderName = "openai" | "claude" | "gemini" | "grok" | "perplexity" | "mistral" | "deepseek";

export type ProviderOption = {
  id: ProviderName;
  label: string;
  shortcut: string;
  supportsSearch: boolean;
  models: string[];
};

export const PROVIDER_OPTIONS: ProviderOption[] = [
  {
    id: "openai",
    label: "OpenAI",
    shortcut: "gpt",
    supportsSearch: true,
    models: ["gpt-5", "gpt-5-mini", "gpt-5-nano", "gpt-4.1", "gpt-4o-search-preview"],
  },
  {
    id: "claude",
    label: "Claude",
    shortcut: "cla",
    supportsSearch: false,
    models: ["claude-opus-4-1", "claude-sonnet-4-5", "claude-haiku-4-5"],
  },
  {
    id: "gemini",
    label: "Gemini",
    shortcut: "gem",
    supportsSearch: true,
    models: ["gemini-2.5-pro", "gemini-2.5-flash", "gemini-2.5-flash-lite"],
  },
  {
    id: "grok",
    label: "Grok",
    shortcut: "grok",
    supportsSearch: false,
    models: ["grok-4-fast-reasoning", "grok-4-fast-non-reasoning", "grok-3-mini"],
  },
  {
    id: "perplexity",
    label: "Perplexity",
    shortcut: "perp",
    supportsSearch: true,
    models: ["sonar", "sonar-pro", "sonar-reasoning-pro"],
  },
  {
    id: "mistral",
    label: "Mistral",
    shortcut: "mist",
    supportsSearch: false,
    models: ["mistral-large-latest", "mistral-medium-latest", "mistral-small-latest"],
  },
  {
    id: "deepseek",
    label: "DeepSeek",
    shortcut: "deep",
    supportsSearch: false,
    models: ["deepseek-chat", "deepseek-reasoner"],
  },
];

const PROVIDERS_BY_ID = new Map(PROVIDER_OPTIONS.map((option) => [option.id, option]));

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_OPTIONS.some((option) => option.id === value);
}

export function getProviderOption(provider: string): ProviderOption | null {
  return isProviderName(provider) ? (PROVIDERS_BY_ID.get(provider) ?? null) : null;
}

export function getProviderLabel(provider: string): string {
  return getProviderOption(provider)?.label ?? provider.charAt(0).toUpperCase() + provider.slice(1);
}

export function providerSupportsSearch(provider: string): boolean {
  return getProviderOption(provider)?.supportsSearch ?? false;
}

export function searchSupportedProviders(): ProviderName[] {
  return PROVIDER_OPTIONS.filter((option) => option.supportsSearch)
    .map((option) => option.id)
    .sort();
}

export function resolveProviderShortcut(shortcut: string): ProviderName | null {
  const value = shortcut.trim().toLowerCase();
  return PROVIDER_OPTIONS.find((option) => option.shortcut === value)?.id ?? null;
}

export function getProviderForModel(model: string): ProviderName | null {
  const value = model.trim();
  return PROVIDER_OPTIONS.find((option) => option.models.includes(value))?.id ?? null;
}

export function normalizeModelQuery(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/** Models whose normalized names contain `query` as an in-order subsequence. */
export function findModelsByQuery(query: string, provider?: string): string[] {
  const pattern = normalizeModelQuery(query);
  if (!pattern) {
    return [];
  }
  const candidates = PROVIDER_OPTIONS.filter((option) => !provider || option.id === provider).flatMap(
    (option) => option.models,
  );
  return candidates.filter((model) => isSubsequence(pattern, normalizeModelQuery(model)));
}

function isSubsequence(pattern: string, target: string): boolean {
  let index = 0;
  for (const ch of target) {
    if (ch === pattern[index]) {
      index += 1;
      if (index === pattern.length) {
        return true;
      }
    }
  }
  return false;
}
