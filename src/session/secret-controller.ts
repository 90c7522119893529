import type { ChatMessage } from "../chat-types.js";
import { cloneMessage } from "../chat-document.js";
import { ModeConflictError, ModeInactiveError } from "../errors.js";

/**
 * Secret mode: off-record turns. The snapshot taken on entry is kept for
 * inspection only; turns are built from the live persisted chat.
 */
export class SecretController {
  readonly #conflictActive: () => boolean;
  #active = false;
  #snapshot: ChatMessage[] = [];

  constructor(conflictActive: () => boolean = () => false) {
    this.#conflictActive = conflictActive;
  }

  get active(): boolean {
    return this.#active;
  }

  enter(context: readonly ChatMessage[]): void {
    if (this.#conflictActive()) {
      throw new ModeConflictError("Cannot enter secret mode while in retry mode");
    }
    this.#active = true;
    this.#snapshot = context.map(cloneMessage);
  }

  exit(): void {
    this.#active = false;
    this.#snapshot = [];
  }

  clear(): void {
    this.exit();
  }

  getContext(): ChatMessage[] {
    if (!this.#active) {
      throw new ModeInactiveError("Not in secret mode");
    }
    return this.#snapshot.map(cloneMessage);
  }
}
