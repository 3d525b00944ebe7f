/**
 * Moderation config slice (`guild_configs.<guildId>.moderation`).
 */
import { ConfigurableModule, defineConfig, z } from "@/configuration";

export const moderationConfigSchema = z.object({
  /** Channel receiving mod-log lines; null disables the mod log. */
  modLogChannelId: z.string().nullable().default(null),
});

export type ModerationConfig = z.infer<typeof moderationConfigSchema>;

export const moderationConfig = defineConfig<ModerationConfig>(
  ConfigurableModule.Moderation,
  moderationConfigSchema,
);
