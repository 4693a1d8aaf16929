#!/usr/bin/env npx tsx
/**
 * Setup wizard — writes the bot's .env file.
 *
 * Run with:  npx tsx setup.ts
 */

import * as p from "@clack/prompts";
import * as fs from "fs";
import * as nodePath from "path";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PROJECT_ROOT = nodePath.dirname(new URL(import.meta.url).pathname);
const ENV_FILE = nodePath.join(PROJECT_ROOT, ".env");

interface EnvQuestion {
  key: string;
  message: string;
  required: boolean;
  secret?: boolean;
  placeholder?: string;
  validate?: (value: string) => string | undefined;
}

const SNOWFLAKE = /^\d+$/;
const SNOWFLAKE_LIST = /^\d+(\s*,\s*\d+)*$/;

function snowflake(value: string): string | undefined {
  return SNOWFLAKE.test(value) ? undefined : "Expected a numeric Discord ID";
}

function snowflakeList(value: string): string | undefined {
  return value === "" || SNOWFLAKE_LIST.test(value) ? undefined : "Expected comma-separated Discord IDs";
}

const QUESTIONS: EnvQuestion[] = [
  { key: "DISCORD_TOKEN", message: "Discord bot token", required: true, secret: true },
  { key: "OPENAI_API_KEY", message: "OpenAI API key", required: true, secret: true },
  { key: "OPENAI_ORG_ID", message: "OpenAI organization ID (optional)", required: false },
  { key: "ASSISTANT_ID", message: "OpenAI Assistant ID", required: true, placeholder: "asst_..." },
  {
    key: "ALLOWED_CHANNELS",
    message: "Channels the bot may answer in (comma-separated, empty = all)",
    required: false,
    validate: snowflakeList,
  },
  { key: "ROLE_ID", message: "Role granted to waitlisted members", required: true, validate: snowflake },
  { key: "FORUM_ID", message: "Forum channel harvested into the FAQ", required: true, validate: snowflake },
  {
    key: "FAQ_SYNC_CRON",
    message: "Forum sync schedule (cron, optional)",
    required: false,
    placeholder: "0 */6 * * *",
  },
  {
    key: "RESTART_CRON",
    message: "Planned restart schedule (cron, optional)",
    required: false,
    placeholder: "0 4 * * *",
  },
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function cancelGuard<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Setup cancelled.");
    process.exit(1);
  }
  return value;
}

function loadExistingEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  if (!fs.existsSync(ENV_FILE)) return env;
  for (const line of fs.readFileSync(ENV_FILE, "utf-8").split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    let value = trimmed.slice(eqIdx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    env[trimmed.slice(0, eqIdx).trim()] = value;
  }
  return env;
}

function formatEnv(values: Record<string, string>): string {
  const lines = ["# Written by setup.ts"];
  for (const [key, value] of Object.entries(values)) {
    if (value === "") continue;
    lines.push(/[\s#"']/.test(value) ? `${key}="${value.replace(/"/g, '\\"')}"` : `${key}=${value}`);
  }
  return lines.join("\n") + "\n";
}

// ---------------------------------------------------------------------------
// Wizard
// ---------------------------------------------------------------------------

async function ask(question: EnvQuestion, existing: string | undefined): Promise<string> {
  const validate = (raw: string): string | undefined => {
    const value = raw.trim();
    if (!value) return question.required && !existing ? "This value is required" : undefined;
    return question.validate?.(value);
  };

  if (question.secret) {
    const answer = cancelGuard(
      await p.password({
        message: existing ? `${question.message} (Enter keeps the current value)` : question.message,
        validate,
      }),
    );
    return answer.trim() || existing || "";
  }

  const answer = cancelGuard(
    await p.text({
      message: question.message,
      placeholder: question.placeholder,
      initialValue: existing,
      validate,
    }),
  );
  return answer.trim();
}

async function main(): Promise<void> {
  p.intro("discord-faq-assistant setup");

  const existing = loadExistingEnv();
  if (fs.existsSync(ENV_FILE)) {
    p.log.warn("An existing .env file was detected.");
    const update = cancelGuard(await p.confirm({ message: "Update existing configuration?", initialValue: true }));
    if (!update) {
      p.outro("No changes made.");
      return;
    }
  }

  const values: Record<string, string> = { ...existing };
  for (const question of QUESTIONS) {
    values[question.key] = await ask(question, existing[question.key]);
  }

  fs.writeFileSync(ENV_FILE, formatEnv(values), { mode: 0o600 });
  p.note("npm start", "Start the bot with");
  p.outro(`Configuration written to ${ENV_FILE}`);
}

main().catch((err: unknown) => {
  p.cancel(`Setup failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
