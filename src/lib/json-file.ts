/**
 * json-file.ts — Typed JSON file helpers shared by the small state files
 * under data/ (waitlist, sync mark, conversation threads).
 */

import fs from "node:fs";
import { atomicWrite } from "./filelock.js";
import { describeError } from "./errors.js";

export type JsonReadResult<T> =
  | { status: "ok"; value: T }
  | { status: "missing" }
  | { status: "invalid"; reason: string };

/**
 * Read and parse `filePath`, accepting the value only if `guard` does.
 */
export function readJsonFile<T>(filePath: string, guard: (value: unknown) => value is T): JsonReadResult<T> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { status: "missing" };
    }
    return { status: "invalid", reason: describeError(err) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { status: "invalid", reason: describeError(err) };
  }
  if (!guard(parsed)) {
    return { status: "invalid", reason: "unexpected shape" };
  }
  return { status: "ok", value: parsed };
}

/** Atomically replace `filePath` with `value` serialized as JSON. */
export function writeJsonFile(filePath: string, value: unknown, indent = 2): void {
  atomicWrite(filePath, JSON.stringify(value, null, indent) + "\n");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "string");
}
