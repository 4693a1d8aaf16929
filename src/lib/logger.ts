/**
 * logger.ts — Levelled logging to the console and a size-rotated log file.
 *
 * Every line looks like `2024-05-01T10:00:00.000Z [INFO] [forum] message`.
 * Call configureLogging() once at startup; until then lines only go to the
 * console.
 */

import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogOptions {
  file?: string;
  level?: LogLevel;
  maxBytes?: number;
  maxFiles?: number;
  console?: boolean;
}

interface LogSink {
  file: string | undefined;
  level: LogLevel;
  maxBytes: number;
  maxFiles: number;
  console: boolean;
}

const DEFAULT_MAX_BYTES = 5 * 1024 * 1024;
const DEFAULT_MAX_FILES = 3;

let sink: LogSink = {
  file: undefined,
  level: "info",
  maxBytes: DEFAULT_MAX_BYTES,
  maxFiles: DEFAULT_MAX_FILES,
  console: true,
};

export function configureLogging(opts: LogOptions): void {
  sink = {
    file: opts.file,
    level: opts.level ?? "info",
    maxBytes: opts.maxBytes ?? DEFAULT_MAX_BYTES,
    maxFiles: opts.maxFiles ?? DEFAULT_MAX_FILES,
    console: opts.console ?? true,
  };
  if (sink.file) {
    fs.mkdirSync(path.dirname(sink.file), { recursive: true });
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Shift `file` -> `file.1` -> `file.2` ... dropping anything past maxFiles.
 * With maxFiles 0 the current file is simply truncated.
 */
export function rotateLogFile(file: string, maxFiles: number): void {
  if (maxFiles <= 0) {
    fs.rmSync(file, { force: true });
    return;
  }
  fs.rmSync(`${file}.${maxFiles}`, { force: true });
  for (let i = maxFiles - 1; i >= 1; i--) {
    const from = `${file}.${i}`;
    if (fs.existsSync(from)) fs.renameSync(from, `${file}.${i + 1}`);
  }
  if (fs.existsSync(file)) fs.renameSync(file, `${file}.1`);
}

function appendToFile(file: string, line: string): void {
  try {
    const incoming = Buffer.byteLength(line) + 1;
    const current = fs.existsSync(file) ? fs.statSync(file).size : 0;
    if (current > 0 && current + incoming > sink.maxBytes) {
      rotateLogFile(file, sink.maxFiles);
    }
    fs.appendFileSync(file, line + "\n");
  } catch (err) {
    // The console is the only place left to report this.
    if (sink.console) console.error(`[logger] Cannot write ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function write(level: LogLevel, scope: string, message: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[sink.level]) return;
  const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${scope}] ${message}`;
  if (sink.console) {
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }
  if (sink.file) appendToFile(sink.file, line);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg) => write("debug", scope, msg),
    info: (msg) => write("info", scope, msg),
    warn: (msg) => write("warn", scope, msg),
    error: (msg) => write("error", scope, msg),
  };
}
