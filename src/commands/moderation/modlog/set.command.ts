/**
 * Motivación: registrar "modlog set" para elegir el canal donde se publican los eventos de moderación.
 */
import type { GuildCommandContext } from "seyfert";
import { createChannelOption, Declare, Options, SubCommand } from "seyfert";
import { ChannelType } from "seyfert/lib/types";
import { safeModerationRun, setModLogChannel } from "@/modules/moderation";
import { modLogUpdatedEmbed } from "@/modules/moderation/views";

const options = {
  channel: createChannelOption({
    description: "Channel for moderation events",
    required: true,
    channel_types: [ChannelType.GuildText],
  }),
};

@Declare({
  name: "set",
  description: "Post moderation events in a channel",
})
@Options(options)
export default class ModLogSetCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const channelId = ctx.options.channel.id;
      await setModLogChannel(ctx.guildId, channelId);
      await ctx.editOrReply({ embeds: [modLogUpdatedEmbed(channelId)] });
    });
  }
}
