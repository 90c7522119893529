import type { DebugEvent } from "../chat-types.js";
import { assertNotAborted, createAbortError, isAbortError, summarizeError } from "../errors.js";

export const MAX_429_RETRY_ATTEMPTS = 4;
const RETRY_BASE_DELAY_MS = 1_250;
const RETRY_MAX_DELAY_MS = 20_000;

/** Run `operation`, retrying rate-limit failures with capped exponential backoff. */
export async function withRateLimitRetry<T>(
  operation: () => Promise<T>,
  params: {
    stage: string;
    signal?: AbortSignal;
    onDebug?: (event: DebugEvent) => void;
    maxAttempts?: number;
    sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
  },
): Promise<T> {
  const maxAttempts = params.maxAttempts ?? MAX_429_RETRY_ATTEMPTS;
  const sleepFn = params.sleepFn ?? sleep;
  let attempt = 0;
  while (true) {
    assertNotAborted(params.signal);
    attempt += 1;
    try {
      return await operation();
    } catch (error) {
      if (params.signal?.aborted || isAbortError(error)) {
        throw createAbortError();
      }
      if (!isRetryable429Error(error) || attempt >= maxAttempts) {
        throw error;
      }
      const delayMs = computeRetryDelayMs(attempt);
      params.onDebug?.({
        stage: "retry_429",
        data: {
          stage: params.stage,
          attempt,
          maxAttempts,
          delayMs,
          error: summarizeError(error),
        },
      });
      await sleepFn(delayMs, params.signal);
    }
  }
}

export function isRetryable429Error(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "status" in error && error.status === 429) {
    return true;
  }
  const text = summarizeError(error).toLowerCase();
  if (!text) {
    return false;
  }
  return (
    text.includes("too many requests") ||
    text.includes("rate limit") ||
    text.includes("\"status\":429") ||
    text.includes("\"code\":429")
  );
}

export function computeRetryDelayMs(attempt: number): number {
  const exponential = RETRY_BASE_DELAY_MS * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(RETRY_MAX_DELAY_MS, exponential);
  const jitter = Math.floor(Math.random() * 500);
  return Math.max(250, Math.floor(capped + jitter));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  assertNotAborted(signal);
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      cleanup();
      reject(createAbortError());
    };
    const cleanup = () => {
      signal?.removeEventListener("abort", onAbort);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
