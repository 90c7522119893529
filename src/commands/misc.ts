import { commandSignal } from "../orchestration/actions.js";
import type { CommandDefinition } from "./types.js";

const helpCommand: CommandDefinition = {
  name: "help",
  usage: "/help",
  description: "show available commands",
  async run(_args, { registry }) {
    return registry.helpText();
  },
};

const exitCommand: CommandDefinition = {
  name: "exit",
  aliases: ["quit"],
  usage: "/exit",
  description: "save and quit",
  async run() {
    return commandSignal("exit");
  },
};

export const MISC_COMMANDS: CommandDefinition[] = [helpCommand, exitCommand];
