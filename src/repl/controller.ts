import { hasPendingError } from "../chat-document.js";
import { createDefaultCommandRegistry, isCommandInput, type CommandRegistry } from "../commands/index.js";
import type { HelperInvoker, InteractionPort } from "../commands/types.js";
import { CommandError, SessionModeError, summarizeError } from "../errors.js";
import type { EventLog } from "../event-log.js";
import { createHelperInvoker } from "../helper-ai.js";
import type { OrchestratorAction } from "../orchestration/actions.js";
import { ChatOrchestrator } from "../orchestration/orchestrator.js";
import { sanitizeErrorMessage } from "../sanitize.js";
import type { SessionManager } from "../session/session-manager.js";
import { pendingErrorGuidance } from "../session/state.js";
import { executeSendAction, type SendOutput } from "./send-pipeline.js";

export type LineOutcome = "continue" | "exit";

export type ReplControllerOptions = {
  manager: SessionManager;
  log: EventLog;
  interaction: InteractionPort;
  output: SendOutput;
  registry?: CommandRegistry;
  invokeHelper?: HelperInvoker;
};

export const RETRY_MODE_BANNER = "♻️ RETRY MODE - Use /apply to accept, /cancel to abort";
export const SECRET_MODE_BANNER = "🔒 SECRET MODE - Messages not saved to history";

/**
 * Drives one submitted line through command dispatch or the orchestrator,
 * then carries out whatever action comes back.
 */
export class ReplController {
  readonly #manager: SessionManager;
  readonly #log: EventLog;
  readonly #interaction: InteractionPort;
  readonly #output: SendOutput;
  readonly #registry: CommandRegistry;
  readonly #invokeHelper: HelperInvoker;
  readonly #orchestrator: ChatOrchestrator;
  #activeRequest: AbortController | null = null;

  constructor(options: ReplControllerOptions) {
    this.#manager = options.manager;
    this.#log = options.log;
    this.#interaction = options.interaction;
    this.#output = options.output;
    this.#registry = options.registry ?? createDefaultCommandRegistry();
    this.#invokeHelper = options.invokeHelper ?? createHelperInvoker(options.manager, options.log);
    this.#orchestrator = new ChatOrchestrator(options.manager, options.log);
  }

  get orchestrator(): ChatOrchestrator {
    return this.#orchestrator;
  }

  get busy(): boolean {
    return this.#activeRequest !== null;
  }

  async processLine(line: string): Promise<LineOutcome> {
    const text = line.trim();
    if (!text) {
      return "continue";
    }

    let action: OrchestratorAction;
    try {
      if (isCommandInput(text)) {
        const result = await this.#registry.dispatch(text, {
          manager: this.#manager,
          interaction: this.#interaction,
          invokeHelper: this.#invokeHelper,
          log: this.#log,
          registry: this.#registry,
        });
        action = this.#orchestrator.handleCommandResult(result);
      } else {
        action = this.#orchestrator.handleUserMessage(text);
      }
    } catch (error) {
      if (!(error instanceof CommandError) && !(error instanceof SessionModeError)) {
        this.#log.log("repl_error", { error: summarizeError(error) });
      }
      this.#output.line(`Error: ${sanitizeErrorMessage(summarizeError(error))}`);
      return "continue";
    }

    return this.#perform(action);
  }

  /** Abort the in-flight request, if any. */
  cancelActiveRequest(): boolean {
    if (!this.#activeRequest) {
      return false;
    }
    this.#activeRequest.abort();
    return true;
  }

  modeBanners(): string[] {
    const banners: string[] = [];
    if (this.#manager.retry.active) {
      banners.push(RETRY_MODE_BANNER);
    }
    if (this.#manager.secret.active) {
      banners.push(SECRET_MODE_BANNER);
    }
    if (!this.#manager.retry.active && !this.#manager.secret.active && hasPendingError(this.#manager.chat)) {
      banners.push(pendingErrorGuidance(true));
    }
    return banners;
  }

  /** Save whatever is open before the process goes away. */
  shutdown(): void {
    this.cancelActiveRequest();
    if (this.#manager.chatPath) {
      this.#manager.saveCurrentChat();
    }
    this.#log.log("session_end", { chat_file: this.#manager.chatPath });
  }

  async #perform(action: OrchestratorAction): Promise<LineOutcome> {
    switch (action.kind) {
      case "break":
        this.shutdown();
        this.#output.line("Goodbye!");
        return "exit";
      case "print":
        this.#output.line(action.message);
        return "continue";
      case "continue":
        if (action.message) {
          this.#output.line(action.message);
        }
        return "continue";
      case "send": {
        const controller = new AbortController();
        this.#activeRequest = controller;
        try {
          const outcome = await executeSendAction(action, {
            orchestrator: this.#orchestrator,
            log: this.#log,
            output: this.#output,
            signal: controller.signal,
          });
          return this.#perform(outcome);
        } catch (error) {
          this.#log.log("repl_error", { error: summarizeError(error) });
          this.#output.line(`Error: ${sanitizeErrorMessage(summarizeError(error))}`);
          return "continue";
        } finally {
          this.#activeRequest = null;
        }
      }
    }
  }
}
