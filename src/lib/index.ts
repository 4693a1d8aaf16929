/**
 * Barrel export for lib/ modules.
 */

export { withFileLockSync, atomicWrite } from "./filelock.js";
export { ConfigError, PersistenceError, ExternalApiError, describeError } from "./errors.js";
export { configureLogging, createLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { loadConfig, loadDotenv, PROJECT_ROOT } from "./config.js";
export type { Config } from "./config.js";
export { KnowledgeStore } from "./knowledge-store.js";
export type { QAEntry } from "./knowledge-store.js";
export { SyncState } from "./sync-state.js";
export { ForumWatcher, extractEntry } from "./forum-watcher.js";
export type { ForumPost, ForumScan, ForumSource, ForumPostResult, SyncReport } from "./forum-watcher.js";
export { WaitlistManager } from "./waitlist.js";
export type { RoleGateway, GuildMemberInfo, RoleGrantResult } from "./waitlist.js";
export { ConversationStore } from "./conversation-store.js";
export { ChatRelay, parseCommand } from "./chat-relay.js";
export type { CompletionClient } from "./chat-relay.js";
export { AssistantClient } from "./assistant-client.js";
export { VectorStoreSync } from "./vector-store-sync.js";
export { createOpenAI, openAIAssistantsApi, openAIVectorStoreApi } from "./openai-api.js";
export { SerialQueue } from "./serial-queue.js";
export { splitMessage, stripCitations, formatReply, DISCORD_MAX_LEN } from "./message-utils.js";
