import type { ChatMessage, DebugEvent, ResponseMetadata } from "../chat-types.js";

export type ProviderRequest = {
  messages: ChatMessage[];
  model: string;
  systemPrompt?: string | null;
  search?: boolean;
  maxOutputTokens?: number;
  signal?: AbortSignal;
  onDebug?: (event: DebugEvent) => void;
};

/** Streamed reply; `metadata.usage` and `metadata.citations` are filled once `chunks` is drained. */
export type ProviderStream = {
  chunks: AsyncIterable<string>;
  metadata: ResponseMetadata;
};

export type ProviderFullResponse = {
  text: string;
  metadata: ResponseMetadata;
};

export interface ProviderGateway {
  readonly provider: string;
  sendMessage(request: ProviderRequest): Promise<ProviderStream>;
  getFullResponse(request: ProviderRequest): Promise<ProviderFullResponse>;
}

export type ProviderGatewayFactory = (provider: string, apiKey: string, timeoutSeconds: number) => ProviderGateway;
