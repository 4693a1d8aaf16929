/**
 * knowledge-store.ts — The FAQ knowledge base harvested from the forum.
 *
 * Questions map to answers, in first-seen order. The whole store is written
 * to a single JSON file (`{"FAQ": [{question, answer}, ...]}`) on every
 * append, through a temp file + rename, after the previous file has been
 * copied to a timestamped `.bak` beside it.
 */

import fs from "node:fs";
import path from "node:path";
import { atomicWrite, withFileLockSync } from "./filelock.js";
import { PersistenceError, describeError } from "./errors.js";
import { readJsonFile, isRecord } from "./json-file.js";
import { createLogger, type Logger } from "./logger.js";

export interface QAEntry {
  readonly question: string;
  readonly answer: string;
}

interface KnowledgeFile {
  FAQ: QAEntry[];
}

export interface KnowledgeStoreOptions {
  /** Number of `.bak` copies to keep; 0 disables backups. Default 5. */
  backupLimit?: number;
  clock?: () => Date;
  logger?: Logger;
}

const DEFAULT_BACKUP_LIMIT = 5;

function isQAEntry(value: unknown): value is QAEntry {
  return isRecord(value) && typeof value["question"] === "string" && typeof value["answer"] === "string";
}

function isKnowledgeFile(value: unknown): value is KnowledgeFile {
  if (!isRecord(value)) return false;
  const faq = value["FAQ"];
  return Array.isArray(faq) && faq.every(isQAEntry);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function backupStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class KnowledgeStore {
  readonly path: string;
  private readonly backupLimit: number;
  private readonly clock: () => Date;
  private readonly log: Logger;
  private answers = new Map<string, string>();

  constructor(storePath: string, opts: KnowledgeStoreOptions = {}) {
    this.path = storePath;
    this.backupLimit = opts.backupLimit ?? DEFAULT_BACKUP_LIMIT;
    this.clock = opts.clock ?? (() => new Date());
    this.log = opts.logger ?? createLogger("knowledge");
  }

  /**
   * Replace the in-memory map with the file's contents. A missing file is an
   * empty store; an unreadable one is logged and also treated as empty.
   */
  load(): this {
    const result = readJsonFile(this.path, isKnowledgeFile);
    const next = new Map<string, string>();
    if (result.status === "ok") {
      for (const entry of result.value.FAQ) {
        next.set(entry.question.trim(), entry.answer);
      }
      this.log.info(`Loaded ${next.size} entries from ${this.path}.`);
    } else if (result.status === "invalid") {
      this.log.warn(`Ignoring unreadable knowledge file ${this.path}: ${result.reason}`);
    }
    this.answers = next;
    return this;
  }

  get size(): number {
    return this.answers.size;
  }

  lookup(question: string): string | undefined {
    return this.answers.get(question.trim());
  }

  entries(): QAEntry[] {
    return [...this.answers].map(([question, answer]) => ({ question, answer }));
  }

  /** Insert or overwrite the entry for `question`, then persist. */
  append(question: string, answer: string): QAEntry {
    const entry = { question: question.trim(), answer };
    this.appendMany([entry]);
    return entry;
  }

  /**
   * Apply `entries` in order (later duplicates win) and persist once.
   * Returns how many entries changed the store; nothing is written when none
   * did. Throws PersistenceError, in which case nothing changes in memory.
   */
  appendMany(entries: readonly QAEntry[]): number {
    const next = new Map(this.answers);
    let changed = 0;
    for (const { question, answer } of entries) {
      const key = question.trim();
      if (next.get(key) === answer) continue;
      next.set(key, answer);
      changed++;
    }
    if (changed === 0) return 0;
    this.persist(next);
    this.answers = next;
    return changed;
  }

  private persist(answers: Map<string, string>): void {
    const body: KnowledgeFile = {
      FAQ: [...answers].map(([question, answer]) => ({ question, answer })),
    };
    try {
      withFileLockSync(this.path, () => {
        this.backup();
        atomicWrite(this.path, JSON.stringify(body, null, 4) + "\n");
      });
    } catch (err) {
      throw err instanceof PersistenceError ? err : new PersistenceError(this.path, err);
    }
  }

  private backup(): void {
    if (this.backupLimit <= 0 || !fs.existsSync(this.path)) return;
    const stamp = backupStamp(this.clock());
    let backupPath = `${this.path}.${stamp}.bak`;
    for (let seq = 1; fs.existsSync(backupPath); seq++) {
      backupPath = `${this.path}.${stamp}_${seq}.bak`;
    }
    try {
      fs.copyFileSync(this.path, backupPath);
    } catch (err) {
      throw new PersistenceError(backupPath, err);
    }
    this.log.debug(`Backup created at ${backupPath}`);
    this.pruneBackups();
  }

  /** Backup paths, oldest first. */
  listBackups(): string[] {
    const dir = path.dirname(this.path);
    const pattern = new RegExp(`^${escapeRegExp(path.basename(this.path))}\\.(\\d{8}_\\d{6})(?:_(\\d+))?\\.bak$`);
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch {
      return [];
    }
    const backups: { name: string; stamp: string; seq: number }[] = [];
    for (const name of names) {
      const match = pattern.exec(name);
      if (match) backups.push({ name, stamp: match[1], seq: match[2] ? Number(match[2]) : 0 });
    }
    return backups
      .sort((a, b) => a.stamp.localeCompare(b.stamp) || a.seq - b.seq)
      .map((b) => path.join(dir, b.name));
  }

  private pruneBackups(): void {
    const backups = this.listBackups();
    for (const old of backups.slice(0, Math.max(0, backups.length - this.backupLimit))) {
      try {
        fs.unlinkSync(old);
        this.log.debug(`Deleted old backup: ${old}`);
      } catch (err) {
        this.log.warn(`Failed to delete old backup ${old}: ${describeError(err)}`);
      }
    }
  }
}
