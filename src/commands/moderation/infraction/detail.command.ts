/**
 * Motivación: registrar "infraction detail" para ver todos los campos de una infracción.
 */
import type { GuildCommandContext } from "seyfert";
import { createIntegerOption, Declare, Options, SubCommand } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { detailEmbed } from "@/modules/moderation/views";
import { replyError } from "../shared";

const options = {
  id: createIntegerOption({
    description: "Infraction ID",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "detail",
  description: "Show a single infraction",
})
@Options(options)
export default class InfractionDetailCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const result = await ctx.getModeration().ledger.detail(ctx.guildId, ctx.options.id);
      if (result.isErr()) return replyError(ctx, result.error);
      await ctx.editOrReply({ embeds: [detailEmbed(result.unwrap())] });
    });
  }
}
