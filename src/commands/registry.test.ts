import { describe, expect, it } from "vitest";
import { CommandError } from "../errors.js";
import { createCommandHarness } from "../testing/fakes.js";
import { createCommandRegistry, isCommandInput, parseCommand } from "./registry.js";
import type { CommandDefinition } from "./types.js";

function command(name: string, aliases?: string[]): CommandDefinition {
  return {
    name,
    aliases,
    usage: `/${name}`,
    description: `${name} things`,
    async run(args) {
      return `${name}:${args}`;
    },
  };
}

describe("parseCommand", () => {
  it("splits the name from the rest of the line", () => {
    expect(parseCommand("/Model  gpt 5 ")).toEqual({ name: "model", args: "gpt 5" });
    expect(parseCommand("/help")).toEqual({ name: "help", args: "" });
    expect(parseCommand("/title line one\nline two")).toEqual({ name: "title", args: "line one\nline two" });
  });

  it("returns null for plain text and a bare slash", () => {
    expect(parseCommand("hello")).toBeNull();
    expect(parseCommand("/")).toBeNull();
    expect(isCommandInput("  /help")).toBe(true);
    expect(isCommandInput("hi /help")).toBe(false);
  });
});

describe("CommandRegistry", () => {
  it("resolves names and aliases case-insensitively", () => {
    const registry = createCommandRegistry().registerMany([command("exit", ["quit"]), command("help")]);

    expect(registry.get("QUIT")?.name).toBe("exit");
    expect(registry.has("help")).toBe(true);
    expect(registry.has("nope")).toBe(false);
    expect(registry.names()).toEqual(["exit", "help", "quit"]);
    expect(registry.list().map((entry) => entry.name)).toEqual(["exit", "help"]);
  });

  it("rejects duplicate names", () => {
    const registry = createCommandRegistry().register(command("exit", ["quit"]));

    expect(() => registry.register(command("quit"))).toThrow("command already registered: quit");
  });

  it("aligns the help text", () => {
    const registry = createCommandRegistry().registerMany([command("exit", ["quit"]), command("go")]);

    expect(registry.helpText()).toBe(["Commands", "  /exit  exit things (alias: /quit)", "  /go    go things"].join("\n"));
  });

  it("dispatches and logs the resolved command", async () => {
    const harness = createCommandHarness();

    await expect(harness.run("/QUIT")).resolves.toEqual({ kind: "exit" });
    expect(harness.log.events).toEqual([{ event: "command", fields: { name: "exit" } }]);
  });

  it("raises command errors for unknown or empty commands", async () => {
    const harness = createCommandHarness();

    await expect(harness.run("/frobnicate")).rejects.toThrow(new CommandError("Unknown command: /frobnicate"));
    await expect(harness.run("/")).rejects.toThrow("Empty command. Type /help for the list of commands.");
  });

  it("lists every default command in the help output", async () => {
    const harness = createCommandHarness();
    const help = await harness.run("/help");

    expect(typeof help).toBe("string");
    const names = ["/model", "/retry", "/apply", "/secret", "/rewind", "/purge", "/title", "/safe", "/new", "/delete", "/gpt"];
    for (const name of names) {
      expect(help).toContain(`  ${name}`);
    }
  });
});
