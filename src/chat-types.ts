export type ChatRole = "user" | "assistant" | "error";

export type Citation = {
  number?: number;
  title?: string | null;
  url?: string | null;
};

export type ChatMessage = {
  role: ChatRole;
  content: string[];
  timestamp?: string;
  model?: string;
  citations?: Citation[];
  details?: Record<string, unknown>;
  // Runtime-only reference id; never written to disk.
  referenceId?: string;
  extras?: Record<string, unknown>;
};

export type ChatMetadata = {
  title: string | null;
  summary: string | null;
  systemPrompt: string | null;
  createdUtc: string | null;
  updatedUtc: string | null;
  extras?: Record<string, unknown>;
};

export type ChatDocument = {
  metadata: ChatMetadata;
  messages: ChatMessage[];
};

export type RetryAttempt = {
  userText: string;
  assistantText: string;
  citations?: Citation[];
};

export type TokenUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  cachedTokens?: number;
  reasoningTokens?: number;
};

export type ResponseMetadata = {
  provider: string;
  model: string;
  startedAt: number;
  usage?: TokenUsage;
  citations?: Citation[];
};

export type DebugEvent = {
  stage: string;
  data: unknown;
};
