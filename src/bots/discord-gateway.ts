/**
 * discord-gateway.ts — discord.js implementations of the platform
 * interfaces used by the handlers (ForumSource, RoleGateway).
 */

import {
  ChannelType,
  type AnyThreadChannel,
  type Client,
  type ForumChannel,
  type Guild,
} from "discord.js";
import type { ForumPost, ForumScan, ForumSource } from "../lib/forum-watcher.js";
import type { GuildMemberInfo, RoleGateway } from "../lib/waitlist.js";
import { ExternalApiError, describeError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";

const log = createLogger("discord");

const HISTORY_LIMIT = 100;

async function discordCall<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new ExternalApiError("discord", `${what}: ${describeError(err)}`, err);
  }
}

export async function fetchForumChannel(client: Client, forumId: string): Promise<ForumChannel> {
  const channel = await discordCall(`Fetching channel ${forumId}`, () => client.channels.fetch(forumId));
  if (!channel || channel.type !== ChannelType.GuildForum) {
    throw new ExternalApiError("discord", `Forum channel ${forumId} not found. Please check the FORUM_ID.`);
  }
  return channel;
}

/** Convert a forum thread into a ForumPost, reading its starter message and replies. */
export async function threadToPost(thread: AnyThreadChannel): Promise<ForumPost> {
  // A deleted starter message rejects; the post may still have replies.
  const starter = await thread.fetchStarterMessage().catch(() => null);

  const history = await discordCall(`Reading thread ${thread.id}`, () =>
    thread.messages.fetch({ limit: HISTORY_LIMIT }),
  );
  const replies = [...history.values()]
    .filter((m) => m.id !== thread.id && m.id !== starter?.id && !m.system)
    .sort((a, b) => a.createdTimestamp - b.createdTimestamp);

  return {
    threadId: thread.id,
    title: thread.name,
    body: starter?.content ?? null,
    replies: replies.map((m) => m.content),
    replyIds: replies.map((m) => m.id),
  };
}

/** Active and archived threads of a forum channel. */
export async function listForumThreads(forum: ForumChannel): Promise<AnyThreadChannel[]> {
  const active = await discordCall("Fetching active threads", () => forum.threads.fetchActive());
  const threads = new Map<string, AnyThreadChannel>();
  for (const thread of active.threads.values()) {
    if (thread.parentId === forum.id) threads.set(thread.id, thread);
  }

  let before: Date | undefined;
  for (;;) {
    const page = await discordCall("Fetching archived threads", () =>
      forum.threads.fetchArchived({ limit: HISTORY_LIMIT, before }),
    );
    let oldest: Date | undefined;
    for (const thread of page.threads.values()) {
      threads.set(thread.id, thread);
      const archivedAt = thread.archivedAt ?? undefined;
      if (archivedAt && (!oldest || archivedAt < oldest)) oldest = archivedAt;
    }
    if (!page.hasMore || !oldest) break;
    before = oldest;
  }

  return [...threads.values()];
}

export class DiscordForumSource implements ForumSource {
  private readonly client: Client;
  private readonly forumId: string;

  constructor(client: Client, forumId: string) {
    this.client = client;
    this.forumId = forumId;
  }

  /** Only wanted threads have their messages read; one failing thread does not stop the rest. */
  async listPosts(wanted: (threadId: string) => boolean): Promise<ForumScan> {
    const forum = await fetchForumChannel(this.client, this.forumId);
    const scan: ForumScan = { posts: [], unreadable: [] };
    for (const thread of await listForumThreads(forum)) {
      if (!wanted(thread.id)) continue;
      try {
        scan.posts.push(await threadToPost(thread));
      } catch (err) {
        log.warn(`Skipping thread ${thread.id} this round: ${describeError(err)}`);
        scan.unreadable.push(thread.id);
      }
    }
    return scan;
  }
}

export class DiscordRoleGateway implements RoleGateway {
  private readonly guild: Guild;

  constructor(guild: Guild) {
    this.guild = guild;
  }

  async assignRole(userId: string, roleId: string): Promise<void> {
    await discordCall(`Assigning role ${roleId} to ${userId}`, async () => {
      const member = await this.guild.members.fetch(userId);
      await member.roles.add(roleId);
    });
  }

  async sendDirectMessage(userId: string, text: string): Promise<void> {
    await discordCall(`Sending DM to ${userId}`, async () => {
      const member = await this.guild.members.fetch(userId);
      await member.send(text);
    });
  }
}

export async function listGuildMembers(guild: Guild): Promise<GuildMemberInfo[]> {
  const members = await discordCall(`Fetching members of ${guild.name}`, () => guild.members.fetch());
  return [...members.values()].map((member) => ({
    userId: member.id,
    roleIds: [...member.roles.cache.keys()],
    bot: member.user.bot,
  }));
}
