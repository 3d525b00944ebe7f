/**
 * Seyfert API Adapter Layer.
 *
 * Purpose: Implement the moderation platform ports on top of a seyfert client.
 * Everything Discord-specific the core needs (role ranks, kick/ban, message
 * history, bulk delete, user lookup, mod-log posting) goes through here.
 *
 * Gotchas:
 * - `roles.highest(true)` is undefined for members with no roles; that ranks as 0
 *   (the @everyone position).
 * - Discord's bulk-delete endpoint rejects a single id, so one message goes
 *   through the single delete route.
 */
import type { UsingClient } from "seyfert";
import { Embed } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import type {
  ChannelMessage,
  HierarchySnapshot,
  MemberActions,
  MessageHistory,
  ModLogChannel,
  UserDirectory,
} from "@/modules/moderation/platform";
import type { ModerationPlatform } from "@/modules/moderation";
import type { UserIdentity } from "@/modules/moderation/types";
import { snowflakeTimestamp } from "@/utils/snowflake";
import { EMBED_DESCRIPTION_LIMIT, truncate } from "@/utils/text";

export class SeyfertMemberActions implements MemberActions {
  constructor(private readonly client: UsingClient) {}

  async hierarchy(guildId: string, actorId: string, targetId: string): Promise<HierarchySnapshot> {
    const botId = this.client.me?.id;
    if (!botId) throw new Error("Bot user is not available yet");

    const guild = await this.client.guilds.fetch(guildId);
    const rankOf = async (memberId: string): Promise<number> => {
      const member = await guild.members.fetch(memberId, true);
      const highest = await member.roles.highest(true);
      return highest?.position ?? 0;
    };

    const [actorRank, targetRank, selfRank] = await Promise.all([
      rankOf(actorId),
      rankOf(targetId),
      rankOf(botId),
    ]);

    return {
      actorRank,
      targetRank,
      selfRank,
      actorIsOwner: guild.ownerId === actorId,
      targetIsOwner: guild.ownerId === targetId,
    };
  }

  async kick(guildId: string, userId: string, auditReason: string): Promise<void> {
    await this.client.members.kick(guildId, userId, auditReason);
  }

  async ban(guildId: string, userId: string, auditReason: string, deleteMessageSeconds: number): Promise<void> {
    await this.client.bans.create(guildId, userId, { delete_message_seconds: deleteMessageSeconds }, auditReason);
  }
}

export class SeyfertUserDirectory implements UserDirectory {
  constructor(private readonly client: UsingClient) {}

  async resolve(userId: string): Promise<UserIdentity | null> {
    try {
      const user = await this.client.users.fetch(userId);
      return { id: user.id, tag: user.tag, avatarUrl: user.avatarURL() };
    } catch (error) {
      this.client.logger.debug(`[adapter] user ${userId} could not be fetched`, error);
      return null;
    }
  }
}

export class SeyfertMessageHistory implements MessageHistory {
  constructor(private readonly client: UsingClient) {}

  async fetchPage(channelId: string, options: { limit: number; before?: string }): Promise<ChannelMessage[]> {
    const batch = await this.client.messages.list(
      channelId,
      options.before ? { limit: options.limit, before: options.before } : { limit: options.limit },
    );

    return batch.map((message) => ({
      id: message.id,
      authorId: message.author.id,
      content: message.content,
      createdAt: message.timestamp ?? snowflakeTimestamp(message.id),
    }));
  }

  async bulkDelete(channelId: string, messageIds: readonly string[], reason: string): Promise<number> {
    if (messageIds.length === 0) return 0;
    if (messageIds.length === 1) {
      await this.client.messages.delete(messageIds[0], channelId, reason);
      return 1;
    }
    await this.client.messages.purge([...messageIds], channelId, reason);
    return messageIds.length;
  }
}

export class SeyfertModLogChannel implements ModLogChannel {
  constructor(private readonly client: UsingClient) {}

  async post(channelId: string, title: string, description: string): Promise<void> {
    await this.client.messages.write(channelId, {
      embeds: [
        new Embed({
          title,
          description: truncate(description, EMBED_DESCRIPTION_LIMIT),
          color: EmbedColors.Blurple,
          timestamp: new Date().toISOString(),
        }),
      ],
      allowed_mentions: { parse: [] },
    });
  }
}

export function createSeyfertPlatform(client: UsingClient): ModerationPlatform {
  return {
    members: new SeyfertMemberActions(client),
    users: new SeyfertUserDirectory(client),
    history: new SeyfertMessageHistory(client),
    modLogChannel: new SeyfertModLogChannel(client),
  };
}
