import OpenAI from "openai";
import type { ChatMessage, Citation, ResponseMetadata, TokenUsage } from "../chat-types.js";
import { isRecord, messageText } from "../chat-document.js";
import { createAbortError } from "../errors.js";
import { timeoutToMilliseconds } from "../session/timeouts.js";
import { withRateLimitRetry } from "./retry.js";
import type { ProviderFullResponse, ProviderGateway, ProviderRequest, ProviderStream } from "./types.js";

const BASE_URLS: Record<string, string | undefined> = {
  openai: undefined,
  claude: "https://api.anthropic.com/v1/",
  grok: "https://api.x.ai/v1",
  perplexity: "https://api.perplexity.ai",
  mistral: "https://api.mistral.ai/v1",
  deepseek: "https://api.deepseek.com",
};

export function supportsOpenAiCompatibleProvider(provider: string): boolean {
  return provider in BASE_URLS;
}

/** Gateway for every provider that speaks the chat-completions wire format. */
export class OpenAiCompatibleGateway implements ProviderGateway {
  readonly provider: string;
  readonly #client: OpenAI;

  constructor(provider: string, apiKey: string, timeoutSeconds: number, client?: OpenAI) {
    this.provider = provider;
    this.#client =
      client ??
      new OpenAI({
        apiKey,
        baseURL: BASE_URLS[provider],
        timeout: timeoutToMilliseconds(timeoutSeconds),
        maxRetries: 0,
      });
  }

  async sendMessage(request: ProviderRequest): Promise<ProviderStream> {
    const metadata: ResponseMetadata = {
      provider: this.provider,
      model: request.model,
      startedAt: Date.now(),
    };
    const payload = this.#buildPayload(request);
    request.onDebug?.({
      stage: "request",
      data: { provider: this.provider, model: request.model, messageCount: payload.messages.length },
    });

    const stream = await withRateLimitRetry(
      () =>
        this.#client.chat.completions.create(
          { ...payload, stream: true, stream_options: { include_usage: true } },
          { signal: request.signal },
        ),
      { stage: "chat_completion_stream", signal: request.signal, onDebug: request.onDebug },
    );

    const signal = request.signal;
    async function* readChunks(): AsyncGenerator<string> {
      const citations = new Map<string, Citation>();
      try {
        for await (const chunk of stream) {
          const delta = chunk.choices[0]?.delta?.content;
          if (delta) {
            yield delta;
          }
          if (chunk.usage) {
            metadata.usage = readUsage(chunk.usage);
          }
          collectCitations(chunk, citations);
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
        this.#client.chat.completions.create(
          { ...this.#buildPayload(request), stream: false },
          { signal: request.signal },
        ),
      { stage: "chat_completion", signal: request.signal, onDebug: request.onDebug },
    );
    if (response.usage) {
      metadata.usage = readUsage(response.usage);
    }
    const citations = new Map<string, Citation>();
    collectCitations(response, citations);
    if (citations.size > 0) {
      metadata.citations = Array.from(citations.values());
    }
    return {
      text: (response.choices[0]?.message?.content ?? "").trim(),
      metadata,
    };
  }

  #buildPayload(request: ProviderRequest) {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    const systemPrompt = request.systemPrompt?.trim();
    if (systemPrompt) {
      messages.push({ role: "system", content: systemPrompt });
    }
    messages.push(...toChatCompletionMessages(request.messages));

    const tokenLimit =
      request.maxOutputTokens === undefined
        ? {}
        : this.provider === "openai"
          ? { max_completion_tokens: request.maxOutputTokens }
          : { max_tokens: request.maxOutputTokens };
    const search = request.search && this.provider === "openai" ? { web_search_options: {} } : {};

    return {
      model: request.model,
      messages,
      ...tokenLimit,
      ...search,
    };
  }
}

export function toChatCompletionMessages(messages: readonly ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
  const converted: OpenAI.ChatCompletionMessageParam[] = [];
  for (const message of messages) {
    if (message.role === "user") {
      converted.push({ role: "user", content: messageText(message) });
    } else if (message.role === "assistant") {
      converted.push({ role: "assistant", content: messageText(message) });
    }
  }
  return converted;
}

type CompletionUsage = NonNullable<OpenAI.ChatCompletionChunk["usage"]>;

function readUsage(usage: CompletionUsage): TokenUsage {
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
    cachedTokens: usage.prompt_tokens_details?.cached_tokens,
    reasoningTokens: usage.completion_tokens_details?.reasoning_tokens,
  };
}

/** Perplexity returns a top-level `citations` url list; OpenAI search returns url_citation annotations. */
function collectCitations(payload: unknown, into: Map<string, Citation>): void {
  if (!isRecord(payload)) {
    return;
  }
  if (Array.isArray(payload.citations)) {
    for (const url of payload.citations) {
      if (typeof url === "string" && !into.has(url)) {
        into.set(url, { number: into.size + 1, title: null, url });
      }
    }
  }
  const choices = Array.isArray(payload.choices) ? payload.choices : [];
  for (const choice of choices) {
    if (!isRecord(choice)) {
      continue;
    }
    const body = isRecord(choice.delta) ? choice.delta : isRecord(choice.message) ? choice.message : null;
    const annotations = body && Array.isArray(body.annotations) ? body.annotations : [];
    for (const annotation of annotations) {
      if (!isRecord(annotation) || !isRecord(annotation.url_citation)) {
        continue;
      }
      const url = annotation.url_citation.url;
      if (typeof url !== "string" || into.has(url)) {
        continue;
      }
      const title = annotation.url_citation.title;
      into.set(url, { number: into.size + 1, title: typeof title === "string" ? title : null, url });
    }
  }
}
