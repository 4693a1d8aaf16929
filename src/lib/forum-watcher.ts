/**
 * forum-watcher.ts — Harvest question/answer pairs from forum posts.
 *
 * A post's title is the question. The answer is the first non-empty reply,
 * or the post body when nobody replied. Posts without either are skipped,
 * and sync keeps re-reading them until one of the two shows up.
 */

import type { KnowledgeStore, QAEntry } from "./knowledge-store.js";
import { compareSnowflakes, type SyncState } from "./sync-state.js";
import { PersistenceError, describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface ForumPost {
  threadId: string;
  title: string;
  /** Content of the thread's starter message, if it could be read. */
  body: string | null;
  /** Later messages in the thread, oldest first. */
  replies: string[];
  /** Message IDs matching `replies`, where the source knows them. */
  replyIds?: string[];
}

export interface ForumScan {
  posts: ForumPost[];
  /** Wanted threads whose messages could not be read this time. */
  unreadable: string[];
}

/** Where a sync reads posts from; implemented over discord.js in the bot. */
export interface ForumSource {
  /** Read the posts of every thread for which `wanted` returns true. */
  listPosts(wanted: (threadId: string) => boolean): Promise<ForumScan>;
}

export type ForumPostResult =
  | { status: "stored"; entry: QAEntry }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: PersistenceError };

export interface SyncReport {
  scanned: number;
  added: number;
  skipped: number;
  failed: boolean;
}

export interface ForumWatcherOptions {
  store: KnowledgeStore;
  state: SyncState;
  /** Runs after the store gained entries, e.g. to refresh the vector store. */
  onKnowledgeUpdated?: () => Promise<void>;
  logger?: Logger;
}

export function extractEntry(post: ForumPost): QAEntry | { reason: string } {
  const question = post.title.trim();
  if (!question) return { reason: "empty title" };
  const reply = post.replies.find((r) => r.trim().length > 0);
  const answer = (reply ?? post.body ?? "").trim();
  if (!answer) return { reason: "no answer" };
  return { question, answer };
}

function isEntry(value: QAEntry | { reason: string }): value is QAEntry {
  return "question" in value;
}

export class ForumWatcher {
  private readonly store: KnowledgeStore;
  private readonly state: SyncState;
  private readonly onKnowledgeUpdated: (() => Promise<void>) | undefined;
  private readonly log: Logger;

  constructor(opts: ForumWatcherOptions) {
    this.store = opts.store;
    this.state = opts.state;
    this.onKnowledgeUpdated = opts.onKnowledgeUpdated;
    this.log = opts.logger ?? createLogger("forum");
  }

  /**
   * Store the Q&A pair of a single post. Never throws. The sync mark is left
   * alone, so a later sync still reads the thread and picks up its replies.
   */
  onForumPost(post: ForumPost): ForumPostResult {
    const extracted = extractEntry(post);
    if (!isEntry(extracted)) {
      this.log.info(`Skipping forum post ${post.threadId} (${extracted.reason}).`);
      return { status: "skipped", reason: extracted.reason };
    }
    if (this.store.lookup(extracted.question) === extracted.answer) {
      return { status: "skipped", reason: "already stored" };
    }
    try {
      const entry = this.store.append(extracted.question, extracted.answer);
      this.log.info(`Stored FAQ entry from forum post ${post.threadId}: "${entry.question}"`);
      return { status: "stored", entry };
    } catch (err) {
      if (err instanceof PersistenceError) {
        this.log.error(`Could not store forum post ${post.threadId}: ${err.message}`);
        return { status: "failed", error: err };
      }
      throw err;
    }
  }

  /** onForumPost, followed by the update hook when something was stored. */
  async ingest(post: ForumPost): Promise<ForumPostResult> {
    const result = this.onForumPost(post);
    if (result.status === "stored") await this.notifyUpdated();
    return result;
  }

  /**
   * Called when `replyId` was posted in the thread. Ingests the post only
   * when that reply is the one its answer comes from.
   */
  async onForumReply(post: ForumPost, replyId: string): Promise<ForumPostResult> {
    const answerId = post.replyIds?.[post.replies.findIndex((r) => r.trim().length > 0)];
    if (answerId !== replyId) return { status: "skipped", reason: "not the first reply" };
    return this.ingest(post);
  }

  /**
   * Harvest every post newer than the mark, and every older post still
   * waiting for an answer, in a single write.
   */
  async sync(source: ForumSource): Promise<SyncReport> {
    const pendingBefore = this.state.pendingIds();
    const scan = await source.listPosts((threadId) => this.state.wants(threadId));
    const posts = scan.posts
      .filter((post) => this.state.wants(post.threadId))
      .sort((a, b) => compareSnowflakes(a.threadId, b.threadId));
    this.log.info(`Found ${posts.length} new or pending posts.`);

    const report: SyncReport = { scanned: posts.length, added: 0, skipped: 0, failed: false };
    if (posts.length === 0 && scan.unreadable.length === 0) return report;

    const entries: QAEntry[] = [];
    const waiting = new Set(scan.unreadable);
    for (const post of posts) {
      const extracted = extractEntry(post);
      if (isEntry(extracted)) {
        entries.push(extracted);
      } else {
        report.skipped++;
        if (extracted.reason === "no answer") waiting.add(post.threadId);
        this.log.info(`Skipping forum post ${post.threadId} (${extracted.reason}).`);
      }
    }

    try {
      report.added = this.store.appendMany(entries);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      this.log.error(`FAQ update abandoned: ${err.message}`);
      report.failed = true;
      return report;
    }

    // Pending threads the source did not return, e.g. deleted ones, stay pending.
    const scanned = new Set(posts.map((post) => post.threadId));
    for (const id of pendingBefore) {
      if (!scanned.has(id)) waiting.add(id);
    }
    const newest = [...scanned, ...scan.unreadable].sort(compareSnowflakes).pop();
    this.recordProgress(newest ?? this.state.lastPostId(), [...waiting]);

    this.log.info(`Added ${report.added} new entries to the FAQ.`);
    if (report.added > 0) await this.notifyUpdated();
    return report;
  }

  private recordProgress(threadId: string | null, pending: string[]): void {
    if (threadId === null) return;
    try {
      this.state.record(threadId, pending);
    } catch (err) {
      this.log.error(`Failed to update last processed post ID: ${describeError(err)}`);
    }
  }

  private async notifyUpdated(): Promise<void> {
    if (!this.onKnowledgeUpdated) return;
    try {
      await this.onKnowledgeUpdated();
    } catch (err) {
      this.log.error(`Knowledge update hook failed: ${describeError(err)}`);
    }
  }
}
