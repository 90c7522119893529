export class SessionModeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionModeError";
  }
}

/** Raised when entering one exclusive mode while the other is active. */
export class ModeConflictError extends SessionModeError {
  constructor(message: string) {
    super(message);
    this.name = "ModeConflictError";
  }
}

/** Raised when reading mode state while that mode is not active. */
export class ModeInactiveError extends SessionModeError {
  constructor(message: string) {
    super(message);
    this.name = "ModeInactiveError";
  }
}

/** User-facing validation failure from a slash command. */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}

export class ChatDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChatDocumentError";
  }
}

export class ProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileError";
  }
}

export function createAbortError(): Error {
  const error = new Error("Request interrupted by user.");
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function assertNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

export function summarizeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
