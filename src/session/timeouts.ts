// setTimeout clamps anything above this to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

export function normalizeTimeout(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new RangeError("Timeout must be a non-negative finite number");
  }
  return value;
}

/** Parse `/timeout` input; null when the text is not a number. */
export function parseTimeoutInput(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

export function formatTimeout(seconds: number): string {
  if (seconds === 0) {
    return "0 (wait forever)";
  }
  return `${seconds} seconds`;
}

/** Client timeout in ms; 0 means wait forever. */
export function timeoutToMilliseconds(seconds: number): number {
  if (seconds === 0) {
    return MAX_TIMER_MS;
  }
  return Math.min(MAX_TIMER_MS, Math.round(seconds * 1_000));
}
