/**
 * sync-state.ts — Remembers the newest forum thread already scanned, plus
 * the older threads still waiting for an answer, so a sync only reads
 * threads that can still change the knowledge base.
 */

import { readJsonFile, writeJsonFile, isRecord, isStringArray } from "./json-file.js";
import { createLogger } from "./logger.js";

const log = createLogger("sync-state");

/** Unanswered threads kept for re-reading; the oldest are dropped first. */
export const PENDING_LIMIT = 500;

interface SyncStateFile {
  last_post_id: string;
  pending?: string[];
}

function isSnowflake(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

function isSyncStateFile(value: unknown): value is SyncStateFile {
  if (!isRecord(value)) return false;
  const pending = value["pending"];
  return isSnowflake(value["last_post_id"]) && (pending === undefined || (isStringArray(pending) && pending.every(isSnowflake)));
}

/** Compare two Discord snowflakes numerically. */
export function compareSnowflakes(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

export class SyncState {
  readonly path: string;

  constructor(statePath: string) {
    this.path = statePath;
  }

  private read(): SyncStateFile | null {
    const result = readJsonFile(this.path, isSyncStateFile);
    if (result.status === "ok") return result.value;
    if (result.status === "invalid") {
      log.info(`Failed to load last processed post ID: ${result.reason}`);
    }
    return null;
  }

  /** The last scanned thread ID, or null when nothing was scanned yet. */
  lastPostId(): string | null {
    return this.read()?.last_post_id ?? null;
  }

  /** Threads at or below the mark that had no answer yet, oldest first. */
  pendingIds(): string[] {
    return this.read()?.pending ?? [];
  }

  /** True when `threadId` is newer than the stored mark. */
  isNew(threadId: string): boolean {
    const last = this.lastPostId();
    return last === null || compareSnowflakes(threadId, last) > 0;
  }

  /** True when a sync should read `threadId`: it is new or still pending. */
  wants(threadId: string): boolean {
    return this.isNew(threadId) || this.pendingIds().includes(threadId);
  }

  /** Move the mark forward to `threadId`; never moves it back. */
  advance(threadId: string): void {
    const last = this.lastPostId();
    if (last !== null && compareSnowflakes(threadId, last) <= 0) return;
    this.record(threadId, this.pendingIds());
  }

  /**
   * Store the mark (kept when `threadId` is older) together with the
   * complete pending list.
   */
  record(threadId: string, pending: readonly string[]): void {
    const last = this.lastPostId();
    const mark = last !== null && compareSnowflakes(threadId, last) < 0 ? last : threadId;
    const kept = [...new Set(pending)].sort(compareSnowflakes).slice(-PENDING_LIMIT);
    const body: SyncStateFile = { last_post_id: mark };
    if (kept.length > 0) body.pending = kept;
    writeJsonFile(this.path, body);
    if (mark !== last) log.info(`Last processed post ID updated to ${mark}.`);
  }
}
