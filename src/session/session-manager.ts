import type { ChatDocument, ChatMessage, Citation } from "../chat-types.js";
import { createEmptyChat } from "../chat-document.js";
import { fileConversationStore, type ConversationStore } from "../chat-history.js";
import type { InputMode, RuntimeProfile } from "../config.js";
import { generateReferenceId } from "../reference-ids.js";
import type { ProviderCache } from "../providers/provider-cache.js";
import type { RetryController } from "./retry-controller.js";
import type { SecretController } from "./secret-controller.js";
import type { SessionState } from "./state.js";
import { normalizeTimeout } from "./timeouts.js";

export type SessionSnapshot = {
  currentProvider: string;
  currentModel: string;
  helperProvider: string;
  helperModel: string;
  chatPath: string | null;
  messageCount: number;
  inputMode: InputMode;
  searchMode: boolean;
  retryActive: boolean;
  secretActive: boolean;
  timeoutSeconds: number;
  systemPromptPath: string | null;
  liveReferenceIds: number;
};

/** Typed access to the session record plus the chat lifecycle transitions. */
export class SessionManager {
  readonly #state: SessionState;
  readonly #store: ConversationStore;

  constructor(state: SessionState, store: ConversationStore = fileConversationStore) {
    this.#state = state;
    this.#store = store;
  }

  get store(): ConversationStore {
    return this.#store;
  }

  get currentProvider(): string {
    return this.#state.currentProvider;
  }

  set currentProvider(value: string) {
    this.#state.currentProvider = value;
  }

  get currentModel(): string {
    return this.#state.currentModel;
  }

  set currentModel(value: string) {
    this.#state.currentModel = value;
  }

  get helperProvider(): string {
    return this.#state.helperProvider;
  }

  set helperProvider(value: string) {
    this.#state.helperProvider = value;
  }

  get helperModel(): string {
    return this.#state.helperModel;
  }

  set helperModel(value: string) {
    this.#state.helperModel = value;
  }

  get profile(): RuntimeProfile {
    return this.#state.profile;
  }

  get profilePath(): string | null {
    return this.#state.profilePath;
  }

  get chat(): ChatDocument {
    return this.#state.chat;
  }

  get chatPath(): string | null {
    return this.#state.chatPath;
  }

  /** Repoint the open chat after its file moved. The document is left as is. */
  setChatPath(chatPath: string): void {
    this.#state.chatPath = chatPath;
  }

  get logFile(): string | null {
    return this.#state.logFile;
  }

  get systemPrompt(): string | null {
    return this.#state.systemPrompt;
  }

  set systemPrompt(value: string | null) {
    this.#state.systemPrompt = value;
  }

  get systemPromptPath(): string | null {
    return this.#state.systemPromptPath;
  }

  set systemPromptPath(value: string | null) {
    this.#state.systemPromptPath = value;
  }

  get inputMode(): InputMode {
    return this.#state.inputMode;
  }

  set inputMode(value: string) {
    if (value !== "quick" && value !== "compose") {
      throw new RangeError(`Invalid input mode: ${value}. Must be 'quick' or 'compose'`);
    }
    this.#state.inputMode = value;
  }

  get searchMode(): boolean {
    return this.#state.searchMode;
  }

  set searchMode(value: boolean) {
    this.#state.searchMode = value;
  }

  get retry(): RetryController {
    return this.#state.retry;
  }

  get secret(): SecretController {
    return this.#state.secret;
  }

  get providerCache(): ProviderCache {
    return this.#state.providerCache;
  }

  get referenceIds(): ReadonlySet<string> {
    return this.#state.liveIds;
  }

  get defaultTimeout(): number {
    return this.#state.profile.timeout;
  }

  get timeout(): number {
    return this.#state.timeoutSeconds;
  }

  /** Override the request timeout. Cached clients keep their old timeout, so the cache is dropped. */
  setTimeoutSeconds(value: unknown): number {
    const normalized = normalizeTimeout(value);
    this.#state.timeoutSeconds = normalized;
    this.#state.providerCache.clear();
    return normalized;
  }

  resetTimeoutToDefault(): number {
    return this.setTimeoutSeconds(this.defaultTimeout);
  }

  switchProvider(provider: string, model: string): void {
    this.#state.currentProvider = provider;
    this.#state.currentModel = model;
  }

  toggleInputMode(): InputMode {
    this.#state.inputMode = this.#state.inputMode === "quick" ? "compose" : "quick";
    return this.#state.inputMode;
  }

  switchChat(chatPath: string, chat: ChatDocument): void {
    this.#state.chat = chat;
    this.#state.chatPath = chatPath;
    if (this.#state.systemPromptPath && !chat.metadata.systemPrompt) {
      chat.metadata.systemPrompt = this.#state.systemPromptPath;
    }
    // Attempts release their ids, so modes clear before the new ids are drawn.
    this.clearChatScopedState();
    this.initializeMessageReferenceIds();
  }

  closeChat(): void {
    this.#state.chat = createEmptyChat();
    this.#state.chatPath = null;
    this.#state.liveIds.clear();
    this.clearChatScopedState();
  }

  clearChatScopedState(): void {
    this.#state.retry.clear();
    this.#state.secret.clear();
    this.#state.searchMode = false;
  }

  /** Drop every live id and assign a fresh one to each loaded message. */
  initializeMessageReferenceIds(): void {
    this.#state.liveIds.clear();
    for (const message of this.#state.chat.messages) {
      message.referenceId = generateReferenceId(this.#state.liveIds);
    }
  }

  saveCurrentChat(chatPath?: string | null, chat?: ChatDocument | null): boolean {
    const targetPath = chatPath ?? this.#state.chatPath;
    const targetChat = chat ?? this.#state.chat;
    if (!targetPath) {
      return false;
    }
    this.#store.save(targetPath, targetChat);
    return true;
  }

  reserveReferenceId(): string {
    return generateReferenceId(this.#state.liveIds);
  }

  releaseReferenceId(referenceId: string): void {
    this.#state.liveIds.delete(referenceId);
  }

  assignMessageReferenceId(index: number, chat: ChatDocument = this.#state.chat): string {
    const message = chat.messages[index];
    if (!message) {
      throw new RangeError(`Message index ${index} out of range`);
    }
    if (message.referenceId) {
      this.#state.liveIds.delete(message.referenceId);
    }
    const id = generateReferenceId(this.#state.liveIds);
    message.referenceId = id;
    return id;
  }

  getMessageReferenceId(index: number): string | null {
    return this.#state.chat.messages[index]?.referenceId ?? null;
  }

  removeMessageReferenceId(index: number): void {
    const message = this.#state.chat.messages[index];
    if (message?.referenceId) {
      this.#state.liveIds.delete(message.referenceId);
      delete message.referenceId;
    }
  }

  /** Remove a message (negative indexes count from the end) and release its id. */
  popMessage(index = -1, chat: ChatDocument = this.#state.chat): ChatMessage | null {
    const resolved = index < 0 ? chat.messages.length + index : index;
    if (resolved < 0 || resolved >= chat.messages.length) {
      return null;
    }
    const [removed] = chat.messages.splice(resolved, 1);
    if (removed?.referenceId) {
      this.#state.liveIds.delete(removed.referenceId);
    }
    return removed ?? null;
  }

  addRetryAttempt(userText: string, assistantText: string, referenceId?: string, citations?: Citation[]): string {
    return this.#state.retry.addAttempt(userText, assistantText, referenceId, citations);
  }

  snapshot(): SessionSnapshot {
    const state = this.#state;
    return {
      currentProvider: state.currentProvider,
      currentModel: state.currentModel,
      helperProvider: state.helperProvider,
      helperModel: state.helperModel,
      chatPath: state.chatPath,
      messageCount: state.chat.messages.length,
      inputMode: state.inputMode,
      searchMode: state.searchMode,
      retryActive: state.retry.active,
      secretActive: state.secret.active,
      timeoutSeconds: state.timeoutSeconds,
      systemPromptPath: state.systemPromptPath,
      liveReferenceIds: state.liveIds.size,
    };
  }
}
