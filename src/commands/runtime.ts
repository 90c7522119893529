import type { RuntimeProfile } from "../config.js";
import { CommandError } from "../errors.js";
import {
  PROVIDER_OPTIONS,
  findModelsByQuery,
  getProviderForModel,
  getProviderOption,
  isProviderName,
  resolveProviderShortcut,
} from "../models.js";
import { formatTimeout, parseTimeoutInput } from "../session/timeouts.js";
import { reconcileProviderModes, withNotices } from "./shared.js";
import type { CommandContext, CommandDefinition } from "./types.js";

type ModelSelection = { ok: true; model: string; provider: string } | { ok: false; message: string };

/** A profile entry wins over the catalog, so custom model names resolve too. */
function providerForModel(profile: RuntimeProfile, model: string): string | null {
  for (const [provider, configured] of Object.entries(profile.models)) {
    if (configured === model) {
      return provider;
    }
  }
  return getProviderForModel(model);
}

function modelCandidates(profile: RuntimeProfile, query: string): string[] {
  if (providerForModel(profile, query)) {
    return [query];
  }
  return findModelsByQuery(query);
}

async function selectModel(context: CommandContext, query: string): Promise<ModelSelection> {
  const profile = context.manager.profile;
  const candidates = modelCandidates(profile, query);
  if (candidates.length === 0) {
    return { ok: false, message: `No model matches '${query}'.` };
  }

  let model: string | null = candidates[0] ?? null;
  if (candidates.length > 1) {
    model = await context.interaction.promptSelection(
      candidates.map((candidate) => ({
        value: candidate,
        label: `${candidate} (${providerForModel(profile, candidate) ?? "unknown"})`,
      })),
      { title: `Multiple models match '${query}':`, allowCancel: true },
    );
  }
  if (!model) {
    return { ok: false, message: "Model selection cancelled." };
  }

  const provider = providerForModel(profile, model);
  if (!provider) {
    return { ok: false, message: `No provider found for model '${model}'.` };
  }
  return { ok: true, model, provider };
}

function matchedSuffix(model: string, query: string): string {
  return model === query ? "" : ` [matched from '${query}']`;
}

const modelCommand: CommandDefinition = {
  name: "model",
  usage: "/model [name|default]",
  description: "list models for the current provider, switch model, or restore the profile default",
  async run(args, context) {
    const manager = context.manager;
    if (!args) {
      const option = getProviderOption(manager.currentProvider);
      const models = option?.models ?? [];
      return [
        `Current model: ${manager.currentProvider} (${manager.currentModel})`,
        `Available models for ${manager.currentProvider}:`,
        ...models.map((model) => `  - ${model}`),
      ].join("\n");
    }

    if (args === "default") {
      const provider = manager.profile.defaultAi;
      const model = manager.profile.models[provider] ?? "";
      manager.switchProvider(provider, model);
      return withNotices(`Reverted to profile default: ${provider} (${model})`, reconcileProviderModes(manager));
    }

    const selection = await selectModel(context, args);
    if (!selection.ok) {
      return selection.message;
    }
    manager.switchProvider(selection.provider, selection.model);
    return withNotices(
      `Switched to ${selection.provider} (${selection.model})${matchedSuffix(selection.model, args)}`,
      reconcileProviderModes(manager),
    );
  },
};

const helperCommand: CommandDefinition = {
  name: "helper",
  usage: "/helper [name|default]",
  description: "show or set the helper model used for titles and summaries",
  async run(args, context) {
    const manager = context.manager;
    if (!args) {
      return `Current helper AI: ${manager.helperProvider} (${manager.helperModel})`;
    }

    if (args === "default") {
      const provider = manager.profile.defaultHelperAi ?? manager.profile.defaultAi;
      const model = manager.profile.models[provider] ?? manager.currentModel;
      manager.helperProvider = provider;
      manager.helperModel = model;
      return `Helper AI restored to profile default: ${provider} (${model})`;
    }

    const lowered = args.toLowerCase();
    const provider = resolveProviderShortcut(lowered) ?? (isProviderName(lowered) ? lowered : null);
    if (provider) {
      const model = manager.profile.models[provider];
      if (!model) {
        return `No model configured for ${provider} in profile`;
      }
      manager.helperProvider = provider;
      manager.helperModel = model;
      return `Helper AI set to ${provider} (${model})`;
    }

    const selection = await selectModel(context, args);
    if (!selection.ok) {
      return selection.message;
    }
    manager.helperProvider = selection.provider;
    manager.helperModel = selection.model;
    return `Helper AI set to ${selection.provider} (${selection.model})${matchedSuffix(selection.model, args)}`;
  },
};

const timeoutCommand: CommandDefinition = {
  name: "timeout",
  usage: "/timeout [seconds|default]",
  description: "show or set the request timeout (0 waits forever)",
  async run(args, context) {
    const manager = context.manager;
    if (!args) {
      return `Current timeout: ${formatTimeout(manager.timeout)}`;
    }
    if (args === "default") {
      return `Reverted to profile default: ${formatTimeout(manager.resetTimeoutToDefault())}`;
    }
    const seconds = parseTimeoutInput(args);
    if (seconds === null) {
      throw new CommandError("Invalid timeout value. Use a number (e.g., /timeout 60) or 0 for no timeout.");
    }
    return `Timeout set to ${formatTimeout(manager.setTimeoutSeconds(seconds))}`;
  },
};

function providerShortcutCommand(shortcut: string, provider: string, label: string): CommandDefinition {
  return {
    name: shortcut,
    usage: `/${shortcut}`,
    description: `switch to ${label} with the profile's model`,
    async run(_args, context) {
      const manager = context.manager;
      const model = manager.profile.models[provider];
      if (!model) {
        throw new CommandError(`No model configured for ${provider}`);
      }
      manager.switchProvider(provider, model);
      return withNotices(`Switched to ${provider} (${model})`, reconcileProviderModes(manager, provider));
    },
  };
}

export const RUNTIME_COMMANDS: CommandDefinition[] = [
  modelCommand,
  helperCommand,
  timeoutCommand,
  ...PROVIDER_OPTIONS.map((option) => providerShortcutCommand(option.shortcut, option.id, option.label)),
];
