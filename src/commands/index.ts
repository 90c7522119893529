import { CHAT_FILE_COMMANDS } from "./chat-files.js";
import { HISTORY_COMMANDS } from "./history.js";
import { METADATA_COMMANDS } from "./metadata.js";
import { MISC_COMMANDS } from "./misc.js";
import { MODE_COMMANDS } from "./modes.js";
import { createCommandRegistry, type CommandRegistry } from "./registry.js";
import { RUNTIME_COMMANDS } from "./runtime.js";

export { CommandRegistry, isCommandInput, parseCommand } from "./registry.js";
export type {
  CommandContext,
  CommandDefinition,
  HelperInvoker,
  HelperRequest,
  InteractionPort,
  SelectionOption,
} from "./types.js";

export function createDefaultCommandRegistry(): CommandRegistry {
  return createCommandRegistry()
    .registerMany(RUNTIME_COMMANDS)
    .registerMany(MODE_COMMANDS)
    .registerMany(HISTORY_COMMANDS)
    .registerMany(METADATA_COMMANDS)
    .registerMany(CHAT_FILE_COMMANDS)
    .registerMany(MISC_COMMANDS);
}
