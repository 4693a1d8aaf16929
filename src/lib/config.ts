/**
 * config.ts — Environment configuration for the bot and the CLI.
 *
 * Values come from the process environment, after `.env` at the project
 * root has been loaded with dotenv. loadConfig() collects every problem
 * before throwing, so a bad deploy shows all missing variables at once.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { Cron } from "croner";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export const PROJECT_ROOT = path.resolve(
  import.meta.dirname ?? path.dirname(new URL(import.meta.url).pathname),
  "..",
  "..",
);

export interface Config {
  discordToken: string;
  openaiApiKey: string;
  openaiOrgId: string | undefined;
  assistantId: string;
  allowedChannels: Set<string>;
  roleId: string;
  forumId: string;
  exportForumIds: string[];
  commandPrefix: string;
  chatCommand: string;
  welcomeMessage: string | undefined;
  faqSyncCron: string | undefined;
  restartCron: string | undefined;
  faqBackupLimit: number;
  paths: {
    dataDir: string;
    knowledgeDir: string;
    faqFile: string;
    waitlistFile: string;
    syncStateFile: string;
    threadsFile: string;
  };
  log: {
    file: string;
    level: LogLevel;
    maxBytes: number;
    maxFiles: number;
  };
}

type Env = Record<string, string | undefined>;

export const REQUIRED_VARS = ["DISCORD_TOKEN", "OPENAI_API_KEY", "ASSISTANT_ID", "ROLE_ID", "FORUM_ID"] as const;

/** Load `.env` from the project root into process.env, if present. */
export function loadDotenv(envPath: string = path.join(PROJECT_ROOT, ".env")): void {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

export function parseIdList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
}

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** File locations only; needs none of the secrets. */
export function resolvePaths(env: Env = process.env, root: string = PROJECT_ROOT): Config["paths"] {
  const dataDir = path.resolve(root, envValue(env, "DATA_DIR") ?? "data");
  const knowledgeDir = path.resolve(root, envValue(env, "KNOWLEDGE_DIR") ?? "vector_store");
  return {
    dataDir,
    knowledgeDir,
    faqFile: path.join(knowledgeDir, "faq.json"),
    waitlistFile: path.join(dataDir, "waitlist.json"),
    syncStateFile: path.join(dataDir, "last_processed_post.json"),
    threadsFile: path.join(dataDir, "threads.json"),
  };
}

export function loadConfig(env: Env = process.env, root: string = PROJECT_ROOT): Config {
  const problems: string[] = [];

  const get = (name: string): string | undefined => envValue(env, name);

  const required = (name: (typeof REQUIRED_VARS)[number]): string => {
    const value = get(name);
    if (value === undefined) {
      problems.push(`${name} is not set`);
      return "";
    }
    return value;
  };

  const count = (name: string, fallback: number): number => {
    const raw = get(name);
    if (raw === undefined) return fallback;
    if (!/^\d+$/.test(raw)) {
      problems.push(`${name} must be a non-negative integer (got "${raw}")`);
      return fallback;
    }
    return parseInt(raw, 10);
  };

  const snowflakes = (name: string, ids: string[]): string[] => {
    for (const id of ids) {
      if (!/^\d+$/.test(id)) problems.push(`${name} contains an invalid ID "${id}"`);
    }
    return ids;
  };

  const cron = (name: string): string | undefined => {
    const pattern = get(name);
    if (pattern === undefined) return undefined;
    try {
      new Cron(pattern);
    } catch (err) {
      problems.push(`${name} is not a valid cron pattern: ${err instanceof Error ? err.message : String(err)}`);
    }
    return pattern;
  };

  const discordToken = required("DISCORD_TOKEN");
  const openaiApiKey = required("OPENAI_API_KEY");
  const assistantId = required("ASSISTANT_ID");
  const roleId = snowflakes("ROLE_ID", [required("ROLE_ID")].filter(Boolean))[0] ?? "";
  const forumId = snowflakes("FORUM_ID", [required("FORUM_ID")].filter(Boolean))[0] ?? "";
  const allowedChannels = new Set(snowflakes("ALLOWED_CHANNELS", parseIdList(get("ALLOWED_CHANNELS"))));
  const exportIds = snowflakes("EXPORT_FORUM_IDS", parseIdList(get("EXPORT_FORUM_IDS")));

  const levelRaw = (get("LOG_LEVEL") ?? "info").toLowerCase();
  let level: LogLevel = "info";
  if (isLogLevel(levelRaw)) {
    level = levelRaw;
  } else {
    problems.push(`LOG_LEVEL must be one of debug, info, warn, error (got "${levelRaw}")`);
  }

  const config: Config = {
    discordToken,
    openaiApiKey,
    openaiOrgId: get("OPENAI_ORG_ID"),
    assistantId,
    allowedChannels,
    roleId,
    forumId,
    exportForumIds: exportIds.length > 0 ? exportIds : forumId ? [forumId] : [],
    commandPrefix: get("COMMAND_PREFIX") ?? "!",
    chatCommand: (get("CHAT_COMMAND") ?? "ava").toLowerCase(),
    welcomeMessage: get("WELCOME_MESSAGE")?.replace(/\\n/g, "\n"),
    faqSyncCron: cron("FAQ_SYNC_CRON"),
    restartCron: cron("RESTART_CRON"),
    faqBackupLimit: count("FAQ_BACKUP_LIMIT", 5),
    paths: resolvePaths(env, root),
    log: {
      file: path.resolve(root, get("LOG_FILE") ?? path.join("logs", "bot.log")),
      level,
      maxBytes: count("LOG_MAX_BYTES", 5 * 1024 * 1024),
      maxFiles: count("LOG_MAX_FILES", 3),
    },
  };

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
