import type { Citation } from "../chat-types.js";
import { resolveMaxOutputTokens } from "../config.js";
import { isAbortError, summarizeError } from "../errors.js";
import { debugToEventLog, type EventLog } from "../event-log.js";
import { getProviderLabel } from "../models.js";
import { printAction, type ActionMode, type OrchestratorAction, type SendAction } from "../orchestration/actions.js";
import type { ChatOrchestrator, ResponseContext } from "../orchestration/orchestrator.js";
import { normalizeCitations, resolveRedirectCitations, type RedirectFetch } from "../providers/citations.js";
import { validateAndGetProvider, type ProviderStream } from "../providers/index.js";
import { sanitizeErrorMessage } from "../sanitize.js";

/** Where streamed text goes. `write` appends to the current line; `line` prints a whole one. */
export type SendOutput = {
  write(text: string): void;
  line(text: string): void;
};

export type SendPipelineOptions = {
  orchestrator: ChatOrchestrator;
  log: EventLog;
  output: SendOutput;
  signal?: AbortSignal;
  now?: () => number;
  citationFetch?: RedirectFetch;
};

export function resolveEffectiveMode(mode: ActionMode, search: boolean): string {
  if (!search) {
    return mode;
  }
  return mode === "normal" ? "search" : `search+${mode}`;
}

export function formatCitationList(citations: readonly Citation[]): string[] {
  if (citations.length === 0) {
    return [];
  }
  const lines = ["", "Sources:"];
  citations.forEach((citation, index) => {
    const number = citation.number ?? index + 1;
    const title = citation.title?.trim();
    const url = citation.url?.trim();
    if (title && url) {
      lines.push(`  [${number}] ${title}`, `      ${url}`);
    } else {
      lines.push(`  [${number}] ${title || url || "(no source)"}`);
    }
  });
  return lines;
}

/**
 * Run one send: resolve the provider, stream the reply, then hand the
 * outcome to exactly one of the orchestrator's response handlers.
 */
export async function executeSendAction(action: SendAction, options: SendPipelineOptions): Promise<OrchestratorAction> {
  const { orchestrator, log, output, signal } = options;
  const now = options.now ?? Date.now;
  const manager = orchestrator.manager;
  const provider = manager.currentProvider;
  const model = manager.currentModel;

  const context: ResponseContext = {
    mode: action.mode,
    userInput: action.userInput,
    assistantId: action.assistantId,
    chatPath: action.chatPath ?? manager.chatPath ?? undefined,
    chatData: action.chatData ?? manager.chat,
  };

  const search = action.searchEnabled ?? manager.searchMode;
  const resolution = validateAndGetProvider({
    provider,
    profile: manager.profile,
    timeoutSeconds: manager.timeout,
    cache: manager.providerCache,
    search,
  });
  if (!resolution.ok) {
    orchestrator.rollbackPreSendFailure(context);
    return printAction(`Error: ${resolution.error}`);
  }

  const mode = resolveEffectiveMode(action.mode, search);
  const label = getProviderLabel(provider);
  const startedAt = now();
  let firstTokenAt: number | null = null;
  let text = "";
  let stream: ProviderStream;
  try {
    output.write(action.mode === "retry" && action.assistantId ? `${label} (${action.assistantId}): ` : `${label}: `);
    log.log("ai_request", {
      mode,
      provider,
      model,
      message_count: action.messages.length,
      search,
    });
    stream = await resolution.gateway.sendMessage({
      messages: action.messages,
      model,
      systemPrompt: manager.systemPrompt,
      search,
      maxOutputTokens: resolveMaxOutputTokens(manager.profile, provider),
      signal,
      onDebug: debugToEventLog(log),
    });
    for await (const chunk of stream.chunks) {
      if (firstTokenAt === null) {
        firstTokenAt = now();
      }
      text += chunk;
      output.write(chunk);
    }
  } catch (error) {
    output.line("");
    if (isAbortError(error) || signal?.aborted) {
      log.log("ai_cancel", { mode, provider, model });
      return orchestrator.handleUserCancel(context);
    }
    log.log("ai_error", {
      mode,
      provider,
      model,
      error_type: error instanceof Error ? error.name : typeof error,
      error: summarizeError(error),
    });
    return orchestrator.handleAiError(error, context);
  }
  output.line("");

  const warn = (stage: string, error: unknown, visible: boolean) => {
    const message = sanitizeErrorMessage(summarizeError(error));
    log.log("ai_response_postprocess_warning", { stage, mode, provider, model, error: message });
    if (visible) {
      output.line(`[Warning: ${stage.replace(/_/g, " ")} failed: ${message}]`);
    }
  };

  let citations: Citation[] | undefined;
  try {
    citations = normalizeCitations(stream.metadata.citations);
    if (citations.length > 0) {
      citations = await resolveRedirectCitations(citations, { fetchFn: options.citationFetch });
    }
    for (const line of formatCitationList(citations)) {
      output.line(line);
    }
  } catch (error) {
    warn("citation_processing", error, true);
  }

  try {
    const usage = stream.metadata.usage;
    log.log("ai_response", {
      mode,
      provider,
      model,
      latency_ms: now() - startedAt,
      ttft_ms: firstTokenAt === null ? null : firstTokenAt - startedAt,
      output_chars: text.length,
      input_tokens: usage?.promptTokens,
      output_tokens: usage?.completionTokens,
      total_tokens: usage?.totalTokens,
    });
  } catch (error) {
    warn("response_metrics_logging", error, false);
  }

  return orchestrator.handleAiResponse(text, context, citations);
}
