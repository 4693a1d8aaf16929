/**
 * vector-store-sync.ts — Rebuild the assistant's file_search vector store
 * from the files in the knowledge directory.
 *
 * Steps: remember the newest existing store, upload the knowledge files,
 * create a new store from them, link it to the assistant, delete the old
 * store, reset conversation threads. Failures are logged; a failed step
 * stops the refresh but never throws.
 */

import fs from "node:fs";
import path from "node:path";
import type { ConversationStore } from "./conversation-store.js";
import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface VectorStoreApi {
  newestVectorStore(): Promise<string | null>;
  uploadFile(filePath: string): Promise<string>;
  createVectorStore(name: string, fileIds: string[]): Promise<string>;
  deleteVectorStore(vectorStoreId: string): Promise<void>;
  linkToAssistant(assistantId: string, vectorStoreId: string): Promise<void>;
}

export interface VectorStoreSyncOptions {
  api: VectorStoreApi;
  assistantId: string;
  knowledgeDir: string;
  conversations?: ConversationStore;
  storeName?: string;
  logger?: Logger;
}

/** Backups, lock files and temp files stay local. */
export function isKnowledgeFile(fileName: string): boolean {
  return !fileName.startsWith(".") && !fileName.endsWith(".bak") && !fileName.endsWith(".lock");
}

export function listKnowledgeFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isKnowledgeFile(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

export class VectorStoreSync {
  private readonly api: VectorStoreApi;
  private readonly assistantId: string;
  private readonly knowledgeDir: string;
  private readonly conversations: ConversationStore | undefined;
  private readonly storeName: string;
  private readonly log: Logger;

  constructor(opts: VectorStoreSyncOptions) {
    this.api = opts.api;
    this.assistantId = opts.assistantId;
    this.knowledgeDir = opts.knowledgeDir;
    this.conversations = opts.conversations;
    this.storeName = opts.storeName ?? "FAQ knowledge base";
    this.log = opts.logger ?? createLogger("vector-store");
  }

  /** Returns the new vector store ID, or null if the refresh stopped early. */
  async refresh(): Promise<string | null> {
    let oldStoreId: string | null = null;
    try {
      oldStoreId = await this.api.newestVectorStore();
      if (oldStoreId) this.log.info(`Most recent vector store ID: ${oldStoreId}`);
    } catch (err) {
      this.log.error(`Failed to retrieve vector stores: ${describeError(err)}`);
    }

    const fileIds: string[] = [];
    for (const file of listKnowledgeFiles(this.knowledgeDir)) {
      try {
        const id = await this.api.uploadFile(file);
        fileIds.push(id);
        this.log.info(`Uploaded file: ${path.basename(file)} with ID: ${id}`);
      } catch (err) {
        this.log.error(`Failed to upload ${path.basename(file)}: ${describeError(err)}`);
      }
    }
    if (fileIds.length === 0) {
      this.log.error("No files uploaded. Aborting vector store creation.");
      return null;
    }

    let newStoreId: string;
    try {
      newStoreId = await this.api.createVectorStore(this.storeName, fileIds);
      this.log.info(`Created new vector store with ID: ${newStoreId}`);
    } catch (err) {
      this.log.error(`Failed to create vector store: ${describeError(err)}`);
      return null;
    }

    try {
      await this.api.linkToAssistant(this.assistantId, newStoreId);
      this.log.info(`Linked vector store ${newStoreId} to assistant ${this.assistantId}.`);
    } catch (err) {
      this.log.error(`Failed to link vector store to assistant: ${describeError(err)}`);
      return null;
    }

    if (oldStoreId && oldStoreId !== newStoreId) {
      try {
        await this.api.deleteVectorStore(oldStoreId);
        this.log.info(`Deleted old vector store with ID: ${oldStoreId}`);
      } catch (err) {
        this.log.error(`Failed to delete old vector store: ${describeError(err)}`);
      }
    }

    try {
      this.conversations?.reset();
    } catch (err) {
      this.log.error(`Failed to reset conversation threads: ${describeError(err)}`);
    }
    return newStoreId;
  }
}
