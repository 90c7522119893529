import type { ChatMessage, Citation, RetryAttempt } from "../chat-types.js";
import { cloneMessage } from "../chat-document.js";
import { ModeConflictError, ModeInactiveError } from "../errors.js";
import { generateReferenceId } from "../reference-ids.js";

/**
 * Retry mode lifecycle: enter, collect attempts, then apply or cancel.
 *
 * Attempts are keyed by reference ids drawn from the session's live id set,
 * so every id held here is released again on exit.
 */
export class RetryController {
  readonly #liveIds: Set<string>;
  readonly #conflictActive: () => boolean;
  #active = false;
  #context: ChatMessage[] = [];
  #targetIndex: number | null = null;
  readonly #attempts = new Map<string, RetryAttempt>();

  constructor(liveIds: Set<string>, conflictActive: () => boolean = () => false) {
    this.#liveIds = liveIds;
    this.#conflictActive = conflictActive;
  }

  get active(): boolean {
    return this.#active;
  }

  get targetIndex(): number | null {
    return this.#targetIndex;
  }

  get attemptCount(): number {
    return this.#attempts.size;
  }

  enter(context: readonly ChatMessage[], targetIndex: number | null = null): void {
    if (this.#conflictActive()) {
      throw new ModeConflictError("Cannot enter retry mode while in secret mode");
    }
    this.#releaseAttempts();
    this.#active = true;
    this.#context = context.map(cloneMessage);
    this.#targetIndex = targetIndex;
  }

  exit(): void {
    this.#active = false;
    this.#context = [];
    this.#targetIndex = null;
    this.#releaseAttempts();
  }

  clear(): void {
    this.exit();
  }

  getContext(): ChatMessage[] {
    if (!this.#active) {
      throw new ModeInactiveError("Not in retry mode");
    }
    return this.#context.map(cloneMessage);
  }

  addAttempt(userText: string, assistantText: string, referenceId?: string, citations?: Citation[]): string {
    if (!this.#active) {
      throw new ModeInactiveError("Not in retry mode");
    }
    let id: string;
    if (referenceId) {
      id = referenceId;
      this.#liveIds.add(id);
    } else {
      id = generateReferenceId(this.#liveIds);
    }
    const attempt: RetryAttempt = { userText, assistantText };
    if (citations && citations.length > 0) {
      attempt.citations = citations;
    }
    // Re-adding an id moves it to the end so latestAttemptId stays accurate.
    this.#attempts.delete(id);
    this.#attempts.set(id, attempt);
    return id;
  }

  getAttempt(referenceId: string): RetryAttempt | null {
    return this.#attempts.get(referenceId) ?? null;
  }

  latestAttemptId(): string | null {
    let latest: string | null = null;
    for (const id of this.#attempts.keys()) {
      latest = id;
    }
    return latest;
  }

  attemptIds(): string[] {
    return Array.from(this.#attempts.keys());
  }

  #releaseAttempts(): void {
    for (const id of this.#attempts.keys()) {
      this.#liveIds.delete(id);
    }
    this.#attempts.clear();
  }
}
