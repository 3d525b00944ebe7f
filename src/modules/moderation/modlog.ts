/**
 * Mod log: one line per ledger change or purge, posted to the guild's
 * configured channel.
 *
 * Best-effort: delivery failures are logged and never fail the command that
 * triggered them. Guilds without a configured channel emit nothing.
 */
import { configStore, type ConfigStore } from "@/configuration/store";
import { logger } from "@/utils/logger";
import { moderationConfig } from "./config";
import type { ModLogChannel } from "./platform";
import type { UserIdentity } from "./types";

export type ModLogEvent =
  | "INFRACTION_CREATE"
  | "INFRACTION_UPDATE"
  | "INFRACTION_DELETE"
  | "MESSAGE_CLEAN";

export const MOD_LOG_TITLES = {
  INFRACTION_CREATE: "📝 Infraction created",
  INFRACTION_UPDATE: "✏ Infraction updated",
  INFRACTION_DELETE: "🗑 Infraction deleted",
  MESSAGE_CLEAN: "🧹 Messages purged",
} as const satisfies Record<ModLogEvent, string>;

export interface ModLogEmitter {
  emit(guildId: string, event: ModLogEvent, description: string): Promise<void>;
}

/** Emitter that drops every event. */
export const noopModLog: ModLogEmitter = {
  emit: async () => {},
};

/** "`name` (`123`)" */
export const describeUser = (user: UserIdentity): string => `\`${user.tag}\` (\`${user.id}\`)`;

export class GuildModLog implements ModLogEmitter {
  constructor(
    private readonly channel: ModLogChannel,
    private readonly store: ConfigStore = configStore,
  ) {}

  async emit(guildId: string, event: ModLogEvent, description: string): Promise<void> {
    try {
      const config = await this.store.get(guildId, moderationConfig);
      if (!config.modLogChannelId) return;
      await this.channel.post(config.modLogChannelId, MOD_LOG_TITLES[event], description);
    } catch (error) {
      logger.warn(`[modlog] failed to emit ${event} for guild ${guildId}`, error);
    }
  }
}

export async function setModLogChannel(
  guildId: string,
  channelId: string | null,
  store: ConfigStore = configStore,
): Promise<void> {
  await store.set(guildId, moderationConfig, { modLogChannelId: channelId });
}
