#!/usr/bin/env -S npx tsx
/**
 * faq-assistant CLI — inspect the knowledge base and export forums
 * without running the bot.
 */

import fs from "node:fs";
import path from "node:path";
import { Client, Events, GatewayIntentBits } from "discord.js";
import pc from "picocolors";
import {
  ConfigError,
  KnowledgeStore,
  SyncState,
  configureLogging,
  describeError,
  loadConfig,
  loadDotenv,
} from "./lib/index.js";
import { resolvePaths, PROJECT_ROOT } from "./lib/config.js";
import { writeExport } from "./lib/faq-export.js";
import { fetchForumChannel, listForumThreads, threadToPost } from "./bots/discord-gateway.js";
import type { ForumPost } from "./lib/forum-watcher.js";

// ── Command Registry ─────────────────────────────────────────────────

interface Command {
  name: string;
  description: string;
  aliases?: string[];
  usage?: string;
  run(args: string[]): void | Promise<void>;
}

const commands: Command[] = [];

function registerCommand(cmd: Command): void {
  commands.push(cmd);
}

function findCommand(name: string): Command | undefined {
  const lower = name.toLowerCase();
  return commands.find((cmd) => cmd.name === lower || (cmd.aliases?.includes(lower) ?? false));
}

function openStore(): KnowledgeStore {
  return new KnowledgeStore(resolvePaths().faqFile).load();
}

function printUsage(): void {
  console.log(pc.bold("Usage:") + " faq-assistant <command> [args]\n");
  for (const cmd of commands) {
    console.log(`  ${pc.cyan(cmd.name)}${pc.dim(cmd.usage ?? "")}  ${cmd.description}`);
  }
  console.log();
}

// ── Commands ─────────────────────────────────────────────────────────

registerCommand({
  name: "lookup",
  description: "Print the stored answer for a question",
  usage: " <question>",
  run(args) {
    const question = args.join(" ");
    if (!question.trim()) {
      console.error(pc.red("A question is required."));
      process.exitCode = 1;
      return;
    }
    const answer = openStore().lookup(question);
    if (answer === undefined) {
      console.log(pc.yellow("No entry for that question."));
      process.exitCode = 1;
      return;
    }
    console.log(answer);
  },
});

registerCommand({
  name: "list",
  description: "List the questions in the knowledge base",
  aliases: ["ls"],
  run() {
    const store = openStore();
    for (const { question } of store.entries()) {
      console.log(`  ${question}`);
    }
    console.log(pc.dim(`\n  ${store.size} entries in ${store.path}\n`));
  },
});

registerCommand({
  name: "export",
  description: "Export every thread of the export forums to JSON",
  usage: " [outfile]",
  async run(args) {
    const config = loadConfig();
    const outFile = path.resolve(args[0] ?? path.join(PROJECT_ROOT, "faq_export.json"));
    const client = new Client({ intents: [GatewayIntentBits.Guilds] });
    const ready = new Promise<void>((resolve) => client.once(Events.ClientReady, () => resolve()));
    await client.login(config.discordToken);
    await ready;

    try {
      const posts: ForumPost[] = [];
      for (const forumId of config.exportForumIds) {
        try {
          const forum = await fetchForumChannel(client, forumId);
          for (const thread of await listForumThreads(forum)) {
            posts.push(await threadToPost(thread));
          }
        } catch (err) {
          console.error(pc.red(`  Forum ${forumId}: ${describeError(err)}`));
        }
      }
      const data = writeExport(outFile, posts);
      console.log(pc.green(`  Exported ${data.faq.length} threads to ${outFile}`));
    } finally {
      await client.destroy();
    }
  },
});

registerCommand({
  name: "health",
  description: "Check configuration and data files",
  run() {
    let ok = true;
    const mark = (good: boolean) => (good ? pc.green("✓") : pc.red("✗"));

    try {
      loadConfig();
      console.log(`  ${mark(true)} Configuration`);
    } catch (err) {
      ok = false;
      const lines = err instanceof ConfigError ? err.problems : [describeError(err)];
      console.log(`  ${mark(false)} Configuration`);
      for (const line of lines) console.log(pc.dim(`      ${line}`));
    }

    const paths = resolvePaths();
    for (const [label, dir] of [["Data directory", paths.dataDir], ["Knowledge directory", paths.knowledgeDir]] as const) {
      const exists = fs.existsSync(dir) && fs.statSync(dir).isDirectory();
      console.log(`  ${exists ? mark(true) : pc.yellow("○")} ${label}: ${pc.dim(exists ? dir : "missing (created on first write)")}`);
    }

    const store = openStore();
    console.log(`  ${mark(true)} Knowledge base: ${pc.dim(`${store.size} entries`)}`);
    const last = new SyncState(paths.syncStateFile).lastPostId();
    console.log(`  ${mark(true)} Last harvested post: ${pc.dim(last ?? "none")}`);

    console.log();
    console.log(ok ? pc.green("  All checks passed.") : pc.red("  Some checks failed — see above."));
    if (!ok) process.exitCode = 1;
  },
});

registerCommand({
  name: "help",
  description: "Show this help message",
  aliases: ["--help", "-h"],
  run() {
    printUsage();
  },
});

// ── Main ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  loadDotenv();
  configureLogging({ console: false });
  const [commandName, ...rest] = process.argv.slice(2);
  const cmd = commandName ? findCommand(commandName) : undefined;
  if (cmd) {
    await cmd.run(rest);
  } else {
    printUsage();
  }
}

main().catch((err: unknown) => {
  console.error(pc.red(`Fatal: ${describeError(err)}`));
  process.exit(1);
});
