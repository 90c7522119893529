#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import { createEmptyChat } from "./chat-document.js";
import { fileConversationStore } from "./chat-history.js";
import { expandHomePath, loadProfile, resolveProfilePath } from "./config.js";
import { ProfileError, summarizeError } from "./errors.js";
import { buildLogFilePath, createEventLog } from "./event-log.js";
import { startTuiApp } from "./index.js";
import { createProviderGateway } from "./providers/index.js";
import { sanitizeErrorMessage } from "./sanitize.js";
import { SessionManager } from "./session/session-manager.js";
import { createSessionState } from "./session/state.js";
import { loadSystemPrompt } from "./session/system-prompt.js";

type CliOptions = {
  profile?: string;
  chat?: string;
  log?: string;
};

async function runChat(options: CliOptions): Promise<void> {
  const profilePath = resolveProfilePath(options.profile);
  const profile = loadProfile(profilePath);
  const notices: string[] = [];

  const systemPrompt = loadSystemPrompt(profile.systemPrompt, path.dirname(profilePath));
  if (systemPrompt.warning) {
    notices.push(`Warning: ${systemPrompt.warning}`);
  }

  const logFile = options.log
    ? path.resolve(expandHomePath(options.log))
    : buildLogFilePath(profile.logsDir);
  const log = createEventLog(logFile);

  const state = createSessionState({
    profile,
    profilePath,
    systemPrompt: systemPrompt.content,
    systemPromptPath: systemPrompt.path,
    logFile,
    gatewayFactory: createProviderGateway,
  });
  const manager = new SessionManager(state, fileConversationStore);

  if (options.chat) {
    const store = manager.store;
    const chatPath = store.resolvePath(profile.chatsDir, options.chat);
    if (store.exists(chatPath)) {
      manager.switchChat(chatPath, store.load(chatPath));
      notices.push(`Opened chat: ${chatPath}`);
    } else {
      const chat = createEmptyChat();
      manager.switchChat(chatPath, chat);
      manager.saveCurrentChat();
      notices.push(`Created and opened new chat: ${chatPath}`);
    }
  } else {
    notices.push("No chat open. Use /new or /open to start.");
  }
  notices.push("Type /help for the list of commands.");

  log.log("session_start", {
    provider: manager.currentProvider,
    model: manager.currentModel,
    chat_file: manager.chatPath,
  });

  await startTuiApp({ manager, log, notices });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("chorus")
    .description("Multi-provider terminal chat with retry and secret modes")
    .version("0.1.0", "-v, --version")
    .option("-p, --profile <path>", "profile JSON to load")
    .option("-c, --chat <name>", "chat to open (created when missing)")
    .option("-l, --log <path>", "event log file")
    .action(async (options: CliOptions) => {
      try {
        await runChat(options);
      } catch (error) {
        if (error instanceof ProfileError) {
          console.error(`Profile error: ${error.message}`);
        } else {
          console.error(`Error: ${sanitizeErrorMessage(summarizeError(error))}`);
        }
        process.exitCode = 1;
      }
    });

  return program;
}

await createProgram().parseAsync(process.argv);
