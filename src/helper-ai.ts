import { newUserMessage } from "./chat-document.js";
import type { HelperInvoker } from "./commands/types.js";
import { resolveMaxOutputTokens } from "./config.js";
import { summarizeError } from "./errors.js";
import { debugToEventLog, type EventLog } from "./event-log.js";
import { validateAndGetProvider } from "./providers/index.js";
import type { SessionManager } from "./session/session-manager.js";

/**
 * Helper calls go to the helper provider/model with no chat history and no
 * system prompt. Failures are logged and rethrown for the command to report.
 */
export function createHelperInvoker(manager: SessionManager, log: EventLog): HelperInvoker {
  return async ({ task, prompt }) => {
    const provider = manager.helperProvider;
    const model = manager.helperModel;
    try {
      const resolution = validateAndGetProvider({
        provider,
        profile: manager.profile,
        timeoutSeconds: manager.timeout,
        cache: manager.providerCache,
      });
      if (!resolution.ok) {
        throw new Error(resolution.error);
      }
      const response = await resolution.gateway.getFullResponse({
        messages: [newUserMessage(prompt)],
        model,
        maxOutputTokens: resolveMaxOutputTokens(manager.profile, provider),
        onDebug: debugToEventLog(log),
      });
      return response.text.trim();
    } catch (error) {
      log.log("helper_ai_error", { task, provider, model, error: summarizeError(error) });
      throw error;
    }
  };
}
