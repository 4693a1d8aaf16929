/**
 * waitlist.ts — Members waiting for the access role, and the role grant.
 *
 * The waitlist is a JSON array of user IDs in data/waitlist.json. Every
 * trigger calls the role API once; a failed grant is logged for manual
 * follow-up and is not retried.
 */

import { readJsonFile, writeJsonFile, isStringArray } from "./json-file.js";
import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

/** The guild operations the waitlist needs. */
export interface RoleGateway {
  assignRole(userId: string, roleId: string): Promise<void>;
  sendDirectMessage(userId: string, text: string): Promise<void>;
}

export interface GuildMemberInfo {
  userId: string;
  roleIds: readonly string[];
  bot?: boolean;
}

export type RoleGrantResult = { ok: true } | { ok: false; error: string };

export interface WaitlistOptions {
  gateway: RoleGateway;
  roleId: string;
  filePath: string;
  welcomeMessage?: string;
  logger?: Logger;
}

export const DEFAULT_WELCOME_MESSAGE = [
  "Hello! 👋",
  "",
  "You have just been given access to the members' channels. ✅",
  "",
  "See you soon! ✌️",
].join("\n");

export class WaitlistManager {
  readonly roleId: string;
  private readonly gateway: RoleGateway;
  private readonly filePath: string;
  private readonly welcomeMessage: string;
  private readonly log: Logger;
  private waitlist: string[];

  constructor(opts: WaitlistOptions) {
    this.gateway = opts.gateway;
    this.roleId = opts.roleId;
    this.filePath = opts.filePath;
    this.welcomeMessage = opts.welcomeMessage ?? DEFAULT_WELCOME_MESSAGE;
    this.log = opts.logger ?? createLogger("waitlist");
    this.waitlist = this.load();
  }

  private load(): string[] {
    const result = readJsonFile(this.filePath, isStringArray);
    if (result.status === "ok") {
      this.log.info(`Waitlist loaded (${result.value.length} users).`);
      return [...new Set(result.value)];
    }
    if (result.status === "invalid") {
      this.log.error(`Could not read waitlist ${this.filePath}: ${result.reason}`);
    }
    return [];
  }

  private save(): void {
    try {
      writeJsonFile(this.filePath, this.waitlist);
    } catch (err) {
      this.log.error(`Error saving waitlist: ${describeError(err)}`);
    }
  }

  members(): readonly string[] {
    return this.waitlist;
  }

  has(userId: string): boolean {
    return this.waitlist.includes(userId);
  }

  /** Record `userId` on the waitlist. Returns false if already listed. */
  add(userId: string): boolean {
    if (this.has(userId)) return false;
    this.waitlist.push(userId);
    this.save();
    this.log.info(`Added ${userId} to the waitlist.`);
    return true;
  }

  /** Grant the configured role to `userId`, exactly one API call, no retry. */
  async onWaitlistTrigger(userId: string): Promise<RoleGrantResult> {
    try {
      await this.gateway.assignRole(userId, this.roleId);
    } catch (err) {
      const error = describeError(err);
      this.log.error(`Failed to assign role ${this.roleId} to ${userId}: ${error}`);
      return { ok: false, error };
    }
    this.log.info(`Assigned role ${this.roleId} to ${userId}.`);

    try {
      await this.gateway.sendDirectMessage(userId, this.welcomeMessage);
      this.log.info(`Private message sent to ${userId}.`);
    } catch (err) {
      this.log.warn(`Cannot send private message to ${userId}: ${describeError(err)}`);
    }
    return { ok: true };
  }

  async onMemberJoin(userId: string): Promise<RoleGrantResult> {
    this.add(userId);
    return this.onWaitlistTrigger(userId);
  }

  /**
   * Startup pass: every human member without the role is waitlisted and
   * granted it. Returns the number of successful grants.
   */
  async processWaitlist(members: readonly GuildMemberInfo[]): Promise<number> {
    let granted = 0;
    for (const member of members) {
      if (member.bot || member.roleIds.includes(this.roleId)) continue;
      const result = await this.onMemberJoin(member.userId);
      if (result.ok) granted++;
    }
    this.log.info(`Checked ${members.length} members, granted the role to ${granted}.`);
    return granted;
  }
}
