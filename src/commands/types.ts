import type { EventLog } from "../event-log.js";
import type { CommandResult } from "../orchestration/actions.js";
import type { SessionManager } from "../session/session-manager.js";
import type { CommandRegistry } from "./registry.js";

export type SelectionOption = {
  value: string;
  label: string;
};

/** How commands talk to the person at the terminal. */
export type InteractionPort = {
  promptText(prompt: string): Promise<string>;
  notify(message: string): void;
  promptSelection(
    options: SelectionOption[],
    config?: { title?: string; allowCancel?: boolean },
  ): Promise<string | null>;
};

export type HelperTask = "title_generation" | "summary_generation" | "safety_check";

export type HelperRequest = {
  task: HelperTask;
  prompt: string;
};

/** One-shot request to the helper model. Rejects with the provider's error. */
export type HelperInvoker = (request: HelperRequest) => Promise<string>;

export type CommandContext = {
  manager: SessionManager;
  interaction: InteractionPort;
  invokeHelper: HelperInvoker;
  log: EventLog;
  registry: CommandRegistry;
};

export type CommandDefinition = {
  name: string;
  aliases?: string[];
  usage: string;
  description: string;
  run(args: string, context: CommandContext): Promise<CommandResult>;
};
