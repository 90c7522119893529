import { CommandError } from "../errors.js";
import type { CommandResult } from "../orchestration/actions.js";
import type { CommandContext, CommandDefinition } from "./types.js";

export type ParsedCommand = {
  name: string;
  args: string;
};

export function isCommandInput(text: string): boolean {
  return text.trim().startsWith("/");
}

/** Split `/name rest of line` at the first run of whitespace. */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) {
    return null;
  }
  const match = /^\/(\S*)(?:\s+([\s\S]*))?$/.exec(trimmed);
  const name = match?.[1] ?? "";
  if (!name) {
    return null;
  }
  return { name: name.toLowerCase(), args: match?.[2]?.trim() ?? "" };
}

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDefinition>();
  private readonly aliases = new Map<string, string>();

  register(command: CommandDefinition): this {
    const names = [command.name, ...(command.aliases ?? [])];
    for (const name of names) {
      if (this.commands.has(name) || this.aliases.has(name)) {
        throw new Error(`command already registered: ${name}`);
      }
    }
    this.commands.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      this.aliases.set(alias, command.name);
    }
    return this;
  }

  registerMany(commands: CommandDefinition[]): this {
    for (const command of commands) {
      this.register(command);
    }
    return this;
  }

  get(name: string): CommandDefinition | undefined {
    const key = name.toLowerCase();
    return this.commands.get(this.aliases.get(key) ?? key);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Registration order, which is also the order of the help text. */
  list(): CommandDefinition[] {
    return [...this.commands.values()];
  }

  names(): string[] {
    return [...this.commands.keys(), ...this.aliases.keys()].sort((a, b) => a.localeCompare(b));
  }

  async dispatch(text: string, context: CommandContext): Promise<CommandResult> {
    const parsed = parseCommand(text);
    if (!parsed) {
      throw new CommandError("Empty command. Type /help for the list of commands.");
    }
    const command = this.get(parsed.name);
    if (!command) {
      throw new CommandError(`Unknown command: /${parsed.name}`);
    }
    context.log.log("command", { name: command.name });
    return command.run(parsed.args, context);
  }

  helpText(): string {
    const rows = this.list().map((command) => {
      const aliases = command.aliases?.length ? ` (alias: ${command.aliases.map((a) => `/${a}`).join(", ")})` : "";
      return { usage: command.usage, text: `${command.description}${aliases}` };
    });
    const width = Math.max(...rows.map((row) => row.usage.length));
    return ["Commands", ...rows.map((row) => `  ${row.usage.padEnd(width)}  ${row.text}`)].join("\n");
  }
}

export function createCommandRegistry(): CommandRegistry {
  return new CommandRegistry();
}
