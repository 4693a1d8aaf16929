/**
 * openai-api.ts — The OpenAI SDK behind the AssistantsApi and VectorStoreApi
 * interfaces. Every SDK failure surfaces as ExternalApiError.
 */

import fs from "node:fs";
import OpenAI from "openai";
import type { AssistantsApi } from "./assistant-client.js";
import type { VectorStoreApi } from "./vector-store-sync.js";
import { ExternalApiError, describeError } from "./errors.js";

const RUN_POLL_INTERVAL_MS = 1000;

export function createOpenAI(apiKey: string, organization?: string): OpenAI {
  return new OpenAI({ apiKey, organization: organization ?? null });
}

async function call<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    const status = err instanceof OpenAI.APIError && err.status !== undefined ? ` (HTTP ${err.status})` : "";
    throw new ExternalApiError("openai", `${what} failed${status}: ${describeError(err)}`, err);
  }
}

export function openAIAssistantsApi(openai: OpenAI): AssistantsApi {
  return {
    createThread: (firstMessage) =>
      call("Thread creation", async () => {
        const thread = await openai.beta.threads.create({
          messages: [{ role: "user", content: firstMessage }],
        });
        return thread.id;
      }),

    addMessage: (threadId, text) =>
      call("Adding message", async () => {
        await openai.beta.threads.messages.create(threadId, { role: "user", content: text });
      }),

    runAndWait: (threadId, assistantId) =>
      call("Run", async () => {
        const run = await openai.beta.threads.runs.createAndPoll(
          threadId,
          { assistant_id: assistantId },
          { pollIntervalMs: RUN_POLL_INTERVAL_MS },
        );
        return { id: run.id, status: run.status, lastError: run.last_error?.message ?? null };
      }),

    latestAssistantReply: (threadId, runId) =>
      call("Fetching messages", async () => {
        const page = await openai.beta.threads.messages.list(threadId, {
          order: "desc",
          limit: 1,
          run_id: runId,
        });
        for (const message of page.data) {
          if (message.role !== "assistant") continue;
          const parts: string[] = [];
          for (const block of message.content) {
            if (block.type === "text") parts.push(block.text.value);
          }
          return parts.join("\n");
        }
        return null;
      }),
  };
}

export function openAIVectorStoreApi(openai: OpenAI): VectorStoreApi {
  return {
    newestVectorStore: () =>
      call("Listing vector stores", async () => {
        const page = await openai.vectorStores.list({ limit: 1, order: "desc" });
        return page.data[0]?.id ?? null;
      }),

    uploadFile: (filePath) =>
      call("File upload", async () => {
        const file = await openai.files.create({
          file: fs.createReadStream(filePath),
          purpose: "assistants",
        });
        return file.id;
      }),

    createVectorStore: (name, fileIds) =>
      call("Vector store creation", async () => {
        const store = await openai.vectorStores.create({ name, file_ids: fileIds });
        return store.id;
      }),

    deleteVectorStore: (vectorStoreId) =>
      call("Vector store deletion", async () => {
        await openai.vectorStores.del(vectorStoreId);
      }),

    linkToAssistant: (assistantId, vectorStoreId) =>
      call("Assistant update", async () => {
        await openai.beta.assistants.update(assistantId, {
          tool_resources: { file_search: { vector_store_ids: [vectorStoreId] } },
        });
      }),
  };
}
