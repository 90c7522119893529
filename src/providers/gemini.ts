import { GoogleGenAI, type Content, type GenerateContentConfig, type GenerateContentResponse } from "@google/genai";
import type { ChatMessage, Citation, ResponseMetadata, TokenUsage } from "../chat-types.js";
import { messageText } from "../chat-document.js";
import { createAbortError } from "../errors.js";
import { timeoutToMilliseconds } from "../session/timeouts.js";
import { withRateLimitRetry } from "./retry.js";
import type { ProviderFullResponse, ProviderGateway, ProviderRequest, ProviderStream } from "./types.js";

export class GeminiGateway implements ProviderGateway {
  readonly provider = "gemini";
  readonly #ai: GoogleGenAI;

  constructor(apiKey: string, timeoutSeconds: number) {
    this.#ai = new GoogleGenAI({
      apiKey,
      httpOptions: { timeout: timeoutToMilliseconds(timeoutSeconds) },
    });
  }

  async sendMessage(request: ProviderRequest): Promise<ProviderStream> {
    const metadata: ResponseMetadata = {
      provider: this.provider,
      model: request.model,
      startedAt: Date.now(),
    };
    const contents = toGeminiContents(request.messages);
    request.onDebug?.({
      stage: "request",
      data: { provider: this.provider, model: request.model, messageCount: contents.length },
    });

    const stream = await withRateLimitRetry(
      () =>
        this.#ai.models.generateContentStream({
          model: request.model,
          contents,
          config: buildConfig(request),
        }),
      { stage: "generate_content_stream", signal: request.signal, onDebug: request.onDebug },
    );

    const signal = request.signal;
    async function* readChunks(): AsyncGenerator<string> {
      const citations = new Map<string, Citation>();
      try {
        for await (const chunk of stream) {
          const text = chunk.text;
          if (text) {
            yield text;
          }
          const usage = readUsage(chunk);
          if (usage) {
            metadata.usage = usage;
          }
          collectGroundingCitations(chunk, citations);
        }
      } catch (error) {
        if (signal?.aborted) {
          throw createAbortError();
        }
        throw error;
      }
      if (citations.size > 0) {
        metadata.citations = Array.from(citations.values());
      }
    }

    return { chunks: readChunks(), metadata };
  }

  async getFullResponse(request: ProviderRequest): Promise<ProviderFullResponse> {
    const metadata: ResponseMetadata = {
      provider: this.provider,
      model: request.model,
      startedAt: Date.now(),
    };
    const response = await withRateLimitRetry(
      () =>
        this.#ai.models.generateContent({
          model: request.model,
          contents: toGeminiContents(request.messages),
          config: buildConfig(request),
        }),
      { stage: "generate_content", signal: request.signal, onDebug: request.onDebug },
    );
    const usage = readUsage(response);
    if (usage) {
      metadata.usage = usage;
    }
    const citations = new Map<string, Citation>();
    collectGroundingCitations(response, citations);
    if (citations.size > 0) {
      metadata.citations = Array.from(citations.values());
    }
    return { text: (response.text ?? "").trim(), metadata };
  }
}

export function toGeminiContents(messages: readonly ChatMessage[]): Content[] {
  return messages
    .filter((message) => message.role === "user" || message.role === "assistant")
    .map((message) => ({
      role: message.role === "assistant" ? "model" : "user",
      parts: [{ text: messageText(message) }],
    }));
}

function buildConfig(request: ProviderRequest): GenerateContentConfig {
  const config: GenerateContentConfig = {};
  const systemPrompt = request.systemPrompt?.trim();
  if (systemPrompt) {
    config.systemInstruction = systemPrompt;
  }
  if (request.maxOutputTokens !== undefined) {
    config.maxOutputTokens = request.maxOutputTokens;
  }
  if (request.search) {
    config.tools = [{ googleSearch: {} }];
  }
  if (request.signal) {
    config.abortSignal = request.signal;
  }
  return config;
}

function readUsage(response: GenerateContentResponse): TokenUsage | null {
  const usage = response.usageMetadata;
  if (!usage) {
    return null;
  }
  return {
    promptTokens: usage.promptTokenCount,
    completionTokens: usage.candidatesTokenCount,
    totalTokens: usage.totalTokenCount,
    cachedTokens: usage.cachedContentTokenCount,
    reasoningTokens: usage.thoughtsTokenCount,
  };
}

function collectGroundingCitations(response: GenerateContentResponse, into: Map<string, Citation>): void {
  const chunks = response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];
  for (const chunk of chunks) {
    const url = chunk.web?.uri;
    if (!url || into.has(url)) {
      continue;
    }
    into.set(url, { number: into.size + 1, title: chunk.web?.title ?? null, url });
  }
}
