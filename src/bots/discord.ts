/**
 * Discord bot — answers `!ava` questions through an OpenAI Assistant, keeps
 * the FAQ knowledge base in sync with a forum channel and grants the access
 * role to waitlisted members.
 *
 * Usage:
 *    npx tsx src/bots/discord.ts      # reads config from .env / environment
 */

import { Client, Events, GatewayIntentBits, type Guild, type Message } from "discord.js";
import { Cron } from "croner";
import {
  AssistantClient,
  ChatRelay,
  ConfigError,
  ConversationStore,
  ExternalApiError,
  ForumWatcher,
  KnowledgeStore,
  SerialQueue,
  SyncState,
  VectorStoreSync,
  WaitlistManager,
  configureLogging,
  createLogger,
  createOpenAI,
  describeError,
  formatReply,
  loadConfig,
  loadDotenv,
  openAIAssistantsApi,
  openAIVectorStoreApi,
  parseCommand,
} from "../lib/index.js";
import type { Config } from "../lib/index.js";
import { DiscordForumSource, DiscordRoleGateway, listGuildMembers, threadToPost } from "./discord-gateway.js";

const log = createLogger("discord");

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
function readConfig(): Config {
  loadDotenv();
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      console.error("Set the variables in your .env file or environment (see .env.example).");
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
configureLogging(config.log);

// ---------------------------------------------------------------------------
// Stores and handlers
// ---------------------------------------------------------------------------
const knowledge = new KnowledgeStore(config.paths.faqFile, { backupLimit: config.faqBackupLimit }).load();
const syncState = new SyncState(config.paths.syncStateFile);
const conversations = new ConversationStore(config.paths.threadsFile);

const openai = createOpenAI(config.openaiApiKey, config.openaiOrgId);

const vectorStores = new VectorStoreSync({
  api: openAIVectorStoreApi(openai),
  assistantId: config.assistantId,
  knowledgeDir: config.paths.knowledgeDir,
  conversations,
});

const forumWatcher = new ForumWatcher({
  store: knowledge,
  state: syncState,
  onKnowledgeUpdated: async () => {
    await vectorStores.refresh();
  },
});

const relay = new ChatRelay({
  client: new AssistantClient({
    api: openAIAssistantsApi(openai),
    assistantId: config.assistantId,
    conversations,
  }),
  allowedChannels: config.allowedChannels,
});

// Platform events are handled one at a time.
const queue = new SerialQueue();
let waitlist: WaitlistManager | null = null;

// ---------------------------------------------------------------------------
// Bot setup
// ---------------------------------------------------------------------------
const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.GuildMembers,
  ],
});

function enqueue(label: string, task: () => Promise<void>): void {
  queue.run(task).catch((err: unknown) => {
    log.error(`${label} failed: ${describeError(err)}`);
  });
}

async function syncForum(): Promise<void> {
  const report = await forumWatcher.sync(new DiscordForumSource(client, config.forumId));
  log.info(`Forum sync: ${report.scanned} new posts, ${report.added} stored, ${report.skipped} skipped.`);
}

function findRoleGuild(): Guild | undefined {
  return client.guilds.cache.find((guild) => guild.roles.cache.has(config.roleId));
}

// ---------------------------------------------------------------------------
// Chat command — `!ava <question>`, or `!ava` in reply to a message
// ---------------------------------------------------------------------------
async function answer(message: Message, inlineQuestion: string): Promise<void> {
  if (!relay.isAllowed(message.channelId)) {
    log.info(`Message ignored in channel ${message.channelId} (not in allowed channels).`);
    return;
  }

  let question = inlineQuestion;
  let target = message;
  if (message.reference?.messageId) {
    target = await message.fetchReference();
    question = target.content;
  }
  if (!question.trim()) {
    await message.reply(`Usage: \`${config.commandPrefix}${config.chatCommand} <question>\``);
    return;
  }

  const channel = message.channel;
  const sendTyping = () => ("sendTyping" in channel ? channel.sendTyping() : Promise.resolve());
  await sendTyping();
  // Discord typing expires after ~10s
  const typingInterval = setInterval(() => {
    sendTyping().catch(() => undefined);
  }, 8_000);

  let reply: string | null;
  try {
    reply = await relay.onMessage(message.channelId, question);
  } catch (err) {
    log.error(`Error answering in channel ${message.channelId}: ${describeError(err)}`);
    const notice =
      err instanceof ExternalApiError
        ? "Sorry, the assistant could not answer right now. Please try again later."
        : "Sorry, something went wrong.";
    await target.reply(notice);
    return;
  } finally {
    clearInterval(typingInterval);
  }

  if (reply === null) return;
  for (const chunk of formatReply(reply)) {
    await target.reply(chunk);
  }
}

// ---------------------------------------------------------------------------
// Forum replies — the first reply in a forum thread is its answer
// ---------------------------------------------------------------------------
function onForumMessage(message: Message): void {
  const thread = message.channel;
  if (!thread.isThread() || thread.parentId !== config.forumId) return;
  if (message.id === thread.id || message.system) return;
  enqueue(`Forum reply ${message.id}`, async () => {
    await forumWatcher.onForumReply(await threadToPost(thread), message.id);
  });
}

client.on(Events.MessageCreate, (message) => {
  if (message.author.bot) return;
  onForumMessage(message);
  const question = parseCommand(message.content, config.commandPrefix, config.chatCommand);
  if (question === null) return;
  enqueue(`Command from ${message.author.id}`, () => answer(message, question));
});

// ---------------------------------------------------------------------------
// Waitlist
// ---------------------------------------------------------------------------
client.on(Events.GuildMemberAdd, (member) => {
  if (member.user.bot || !waitlist || member.guild.id !== findRoleGuild()?.id) return;
  const manager = waitlist;
  enqueue(`Member join ${member.id}`, async () => {
    await manager.onMemberJoin(member.id);
  });
});

// ---------------------------------------------------------------------------
// Ready event
// ---------------------------------------------------------------------------
const jobs: Cron[] = [];

async function shutdown(code: number): Promise<void> {
  log.info("Shutting down...");
  for (const job of jobs) job.stop();
  await client.destroy();
  process.exit(code);
}

client.once(Events.ClientReady, (ready) => {
  log.info(`Logged in as ${ready.user.tag} (ID: ${ready.user.id})`);
  log.info(`Knowledge base: ${knowledge.size} entries in ${knowledge.path}`);
  if (config.allowedChannels.size > 0) {
    log.info(`Allowed channels: ${[...config.allowedChannels].join(", ")}`);
  } else {
    log.info("No channel allowlist — answering in every channel.");
  }

  try {
    conversations.reset();
  } catch (err) {
    log.error(`Could not reset conversation threads: ${describeError(err)}`);
  }

  const guild = findRoleGuild();
  if (guild) {
    const manager = new WaitlistManager({
      gateway: new DiscordRoleGateway(guild),
      roleId: config.roleId,
      filePath: config.paths.waitlistFile,
      welcomeMessage: config.welcomeMessage,
    });
    waitlist = manager;
    enqueue("Waitlist processing", async () => {
      await manager.processWaitlist(await listGuildMembers(guild));
    });
  } else {
    log.error(`Role ${config.roleId} not found in any guild; waitlist disabled.`);
  }

  enqueue("Forum sync", syncForum);

  if (config.faqSyncCron) {
    jobs.push(new Cron(config.faqSyncCron, () => enqueue("Scheduled forum sync", syncForum)));
    log.info(`Forum sync scheduled (${config.faqSyncCron}).`);
  }
  if (config.restartCron) {
    jobs.push(
      new Cron(config.restartCron, () => {
        log.info("Planned restart.");
        enqueue("Restart", () => shutdown(0));
      }),
    );
    log.info(`Planned restart scheduled (${config.restartCron}).`);
  }

  process.once("SIGINT", () => enqueue("Shutdown", () => shutdown(0)));
  process.once("SIGTERM", () => enqueue("Shutdown", () => shutdown(0)));
});

process.on("unhandledRejection", (reason) => {
  log.error(`Unhandled rejection: ${describeError(reason)}`);
});

// ---------------------------------------------------------------------------
// Entrypoint
// ---------------------------------------------------------------------------
function main(): void {
  client.login(config.discordToken).catch((err: unknown) => {
    log.error(`Failed to log in: ${describeError(err)}`);
    process.exit(1);
  });
}

main();
