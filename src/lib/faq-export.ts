/**
 * faq-export.ts — One-off dump of whole forums, independent of the sync
 * mark: every thread becomes `{question: title, answer: first message}`.
 */

import type { ForumPost } from "./forum-watcher.js";
import type { QAEntry } from "./knowledge-store.js";
import { writeJsonFile } from "./json-file.js";

export interface FaqExport {
  faq: QAEntry[];
}

export function buildExport(posts: readonly ForumPost[]): FaqExport {
  return {
    faq: posts.map((post) => ({ question: post.title, answer: post.body ?? "" })),
  };
}

export function writeExport(filePath: string, posts: readonly ForumPost[]): FaqExport {
  const data = buildExport(posts);
  writeJsonFile(filePath, data, 4);
  return data;
}
