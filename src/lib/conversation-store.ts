/**
 * conversation-store.ts — Which assistant thread each Discord channel talks in.
 *
 * Reset at startup and whenever the knowledge base is re-linked, so that
 * conversations never keep answering from a stale vector store.
 */

import { readJsonFile, writeJsonFile, isStringRecord } from "./json-file.js";
import { withFileLockSync } from "./filelock.js";
import { createLogger } from "./logger.js";

const log = createLogger("conversations");

export class ConversationStore {
  readonly path: string;

  constructor(storePath: string) {
    this.path = storePath;
  }

  private load(): Record<string, string> {
    const result = readJsonFile(this.path, isStringRecord);
    if (result.status === "invalid") {
      log.error(`Could not read ${this.path}: ${result.reason}`);
    }
    return result.status === "ok" ? result.value : {};
  }

  get(channelId: string): string | null {
    return this.load()[channelId] ?? null;
  }

  set(channelId: string, threadId: string): void {
    withFileLockSync(this.path, () => {
      const data = this.load();
      data[channelId] = threadId;
      writeJsonFile(this.path, data);
    });
  }

  reset(): void {
    withFileLockSync(this.path, () => writeJsonFile(this.path, {}));
    log.info("Conversation threads reset.");
  }
}
