/**
 * chat-relay.ts — Forward questions from allowed channels to the assistant.
 */

import { createLogger, type Logger } from "./logger.js";

/** Produces a reply for `text` in the conversation identified by `channelId`. */
export interface CompletionClient {
  complete(channelId: string, text: string): Promise<string>;
}

export interface ChatRelayOptions {
  client: CompletionClient;
  /** Channel IDs the bot may answer in. Empty means every channel. */
  allowedChannels: ReadonlySet<string>;
  logger?: Logger;
}

/**
 * If `content` invokes `<prefix><command>`, return the text after it
 * (possibly empty); otherwise null. The command name is case-insensitive.
 */
export function parseCommand(content: string, prefix: string, command: string): string | null {
  const trimmed = content.trimStart();
  if (!trimmed.startsWith(prefix)) return null;
  const rest = trimmed.slice(prefix.length);
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(rest);
  if (!match || match[1].toLowerCase() !== command.toLowerCase()) return null;
  return (match[2] ?? "").trim();
}

export class ChatRelay {
  private readonly client: CompletionClient;
  private readonly allowedChannels: ReadonlySet<string>;
  private readonly log: Logger;

  constructor(opts: ChatRelayOptions) {
    this.client = opts.client;
    this.allowedChannels = opts.allowedChannels;
    this.log = opts.logger ?? createLogger("relay");
  }

  isAllowed(channelId: string): boolean {
    return this.allowedChannels.size === 0 || this.allowedChannels.has(channelId);
  }

  /**
   * Returns the assistant's reply verbatim, or null when the message is
   * ignored. Errors from the client propagate unchanged.
   */
  async onMessage(channelId: string, text: string): Promise<string | null> {
    if (!this.isAllowed(channelId)) {
      this.log.info(`Message ignored in channel ${channelId} (not in allowed channels).`);
      return null;
    }
    if (!text.trim()) return null;
    return this.client.complete(channelId, text);
  }
}
