/**
 * assistant-client.ts — CompletionClient on top of an OpenAI Assistant.
 *
 * Each Discord channel gets one assistant thread. A question is appended to
 * the channel's thread (created on first use), a run is started and waited
 * for, and the run's newest assistant message is returned.
 */

import type { CompletionClient } from "./chat-relay.js";
import type { ConversationStore } from "./conversation-store.js";
import { ExternalApiError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface RunOutcome {
  id: string;
  status: string;
  lastError: string | null;
}

/** The thread/run calls the client needs; see openai-api.ts. */
export interface AssistantsApi {
  createThread(firstMessage: string): Promise<string>;
  addMessage(threadId: string, text: string): Promise<void>;
  runAndWait(threadId: string, assistantId: string): Promise<RunOutcome>;
  latestAssistantReply(threadId: string, runId: string): Promise<string | null>;
}

export interface AssistantClientOptions {
  api: AssistantsApi;
  assistantId: string;
  conversations: ConversationStore;
  logger?: Logger;
}

export class AssistantClient implements CompletionClient {
  private readonly api: AssistantsApi;
  private readonly assistantId: string;
  private readonly conversations: ConversationStore;
  private readonly log: Logger;

  constructor(opts: AssistantClientOptions) {
    this.api = opts.api;
    this.assistantId = opts.assistantId;
    this.conversations = opts.conversations;
    this.log = opts.logger ?? createLogger("assistant");
  }

  async complete(channelId: string, text: string): Promise<string> {
    let threadId = this.conversations.get(channelId);
    if (threadId === null) {
      threadId = await this.api.createThread(text);
      this.conversations.set(channelId, threadId);
      this.log.info(`Created thread ${threadId} for channel ${channelId}.`);
    } else {
      await this.api.addMessage(threadId, text);
    }

    const run = await this.api.runAndWait(threadId, this.assistantId);
    if (run.status !== "completed") {
      throw new ExternalApiError("openai", `Run ${run.id} ${run.status}: ${run.lastError ?? "Unknown error"}`);
    }

    const reply = await this.api.latestAssistantReply(threadId, run.id);
    if (reply === null) {
      throw new ExternalApiError("openai", `Run ${run.id} completed without an assistant message`);
    }
    return reply;
  }
}
