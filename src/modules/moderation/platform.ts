/**
 * Platform ports consumed by the moderation core.
 *
 * The seyfert implementations live in `@/adapters/seyfert`; tests provide
 * in-process fakes. Keeping Discord behind these interfaces is what lets the
 * dispatcher, purge engine and ledger be exercised without a gateway.
 */
import type { UserIdentity } from "./types";

/** Snapshot of the role ranks involved in a kick/ban. */
export interface HierarchySnapshot {
  /** Highest role position of the member issuing the command. */
  readonly actorRank: number;
  /** Highest role position of the target member. */
  readonly targetRank: number;
  /** Highest role position of the bot in the guild. */
  readonly selfRank: number;
  readonly actorIsOwner: boolean;
  readonly targetIsOwner: boolean;
}

export interface MemberActions {
  /** Role ranks for actor/target/bot. Rejects when the target is not a member. */
  hierarchy(guildId: string, actorId: string, targetId: string): Promise<HierarchySnapshot>;
  kick(guildId: string, userId: string, auditReason: string): Promise<void>;
  ban(
    guildId: string,
    userId: string,
    auditReason: string,
    deleteMessageSeconds: number,
  ): Promise<void>;
}

/** Resolves ids to display identities; `null` when unknown to the platform. */
export interface UserDirectory {
  resolve(userId: string): Promise<UserIdentity | null>;
}

export interface ChannelMessage {
  readonly id: string;
  readonly authorId: string;
  readonly content: string;
  /** Creation time, epoch milliseconds. */
  readonly createdAt: number;
}

export interface MessageHistory {
  /** Newest-first page of messages strictly older than `before` (or the newest when absent). */
  fetchPage(
    channelId: string,
    options: { limit: number; before?: string },
  ): Promise<ChannelMessage[]>;
  /** Deletes the given messages, returns how many the platform removed. */
  bulkDelete(channelId: string, messageIds: readonly string[], reason: string): Promise<number>;
}

/** Line-oriented sink for the guild's moderation log channel. */
export interface ModLogChannel {
  post(channelId: string, title: string, description: string): Promise<void>;
}
