/**
 * Motivación: registrar "modlog clear" para dejar de publicar eventos de moderación.
 */
import type { GuildCommandContext } from "seyfert";
import { Declare, SubCommand } from "seyfert";
import { safeModerationRun, setModLogChannel } from "@/modules/moderation";
import { modLogUpdatedEmbed } from "@/modules/moderation/views";

@Declare({
  name: "clear",
  description: "Stop posting moderation events",
})
export default class ModLogClearCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await safeModerationRun(ctx, async () => {
      await setModLogChannel(ctx.guildId, null);
      await ctx.editOrReply({ embeds: [modLogUpdatedEmbed(null)] });
    });
  }
}
