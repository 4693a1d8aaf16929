import { describe, it, expect } from "vitest";
import path from "node:path";
import { loadConfig, parseIdList, resolvePaths } from "../src/lib/config.js";
import { ConfigError } from "../src/lib/errors.js";

const ROOT = path.join(path.sep, "srv", "bot");

const BASE_ENV = {
  DISCORD_TOKEN: "test-discord-token",
  OPENAI_API_KEY: "test-openai-key",
  ASSISTANT_ID: "asst_test",
  ROLE_ID: "1000",
  FORUM_ID: "2000",
};

function configError(env: Record<string, string | undefined>): ConfigError {
  try {
    loadConfig(env, ROOT);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(BASE_ENV, ROOT);

    expect(config.allowedChannels.size).toBe(0);
    expect(config.openaiOrgId).toBeUndefined();
    expect(config.commandPrefix).toBe("!");
    expect(config.chatCommand).toBe("ava");
    expect(config.exportForumIds).toEqual(["2000"]);
    expect(config.faqBackupLimit).toBe(5);
    expect(config.faqSyncCron).toBeUndefined();
    expect(config.paths.faqFile).toBe(path.join(ROOT, "vector_store", "faq.json"));
    expect(config.paths.waitlistFile).toBe(path.join(ROOT, "data", "waitlist.json"));
    expect(config.log).toEqual({
      file: path.join(ROOT, "logs", "bot.log"),
      level: "info",
      maxBytes: 5 * 1024 * 1024,
      maxFiles: 3,
    });
  });

  it("parses the channel allow-set", () => {
    const config = loadConfig({ ...BASE_ENV, ALLOWED_CHANNELS: "111, 222,,333 " }, ROOT);
    expect([...config.allowedChannels]).toEqual(["111", "222", "333"]);
  });

  it("reads optional settings", () => {
    const config = loadConfig(
      {
        ...BASE_ENV,
        OPENAI_ORG_ID: "org-test",
        EXPORT_FORUM_IDS: "3000,4000",
        CHAT_COMMAND: "Ask",
        FAQ_BACKUP_LIMIT: "10",
        FAQ_SYNC_CRON: "0 */6 * * *",
        WELCOME_MESSAGE: "Hi!\\nWelcome.",
        LOG_LEVEL: "DEBUG",
        DATA_DIR: "/var/lib/bot",
      },
      ROOT,
    );
    expect(config.openaiOrgId).toBe("org-test");
    expect(config.exportForumIds).toEqual(["3000", "4000"]);
    expect(config.chatCommand).toBe("ask");
    expect(config.faqBackupLimit).toBe(10);
    expect(config.faqSyncCron).toBe("0 */6 * * *");
    expect(config.welcomeMessage).toBe("Hi!\nWelcome.");
    expect(config.log.level).toBe("debug");
    expect(config.paths.threadsFile).toBe(path.join("/var/lib/bot", "threads.json"));
  });

  it("lists every missing required variable", () => {
    const err = configError({ DISCORD_TOKEN: "test-discord-token", OPENAI_API_KEY: "  " });
    expect(err.problems).toEqual([
      "OPENAI_API_KEY is not set",
      "ASSISTANT_ID is not set",
      "ROLE_ID is not set",
      "FORUM_ID is not set",
    ]);
  });

  it("rejects malformed values", () => {
    const err = configError({
      ...BASE_ENV,
      ALLOWED_CHANNELS: "111,general",
      FAQ_BACKUP_LIMIT: "-1",
      LOG_LEVEL: "verbose",
    });
    expect(err.problems).toEqual([
      'ALLOWED_CHANNELS contains an invalid ID "general"',
      'LOG_LEVEL must be one of debug, info, warn, error (got "verbose")',
      'FAQ_BACKUP_LIMIT must be a non-negative integer (got "-1")',
    ]);
  });

  it("rejects an invalid cron pattern", () => {
    const err = configError({ ...BASE_ENV, RESTART_CRON: "every day" });
    expect(err.problems).toHaveLength(1);
    expect(err.problems[0]).toMatch(/^RESTART_CRON is not a valid cron pattern/);
  });
});

describe("parseIdList", () => {
  it("splits and trims", () => {
    expect(parseIdList(" 1 ,2,, 3")).toEqual(["1", "2", "3"]);
    expect(parseIdList(undefined)).toEqual([]);
  });
});

describe("resolvePaths", () => {
  it("resolves relative directories against the root", () => {
    expect(resolvePaths({ KNOWLEDGE_DIR: "kb" }, ROOT).faqFile).toBe(path.join(ROOT, "kb", "faq.json"));
  });
});
