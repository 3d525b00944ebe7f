/**
 * Motivación: registrar "infraction edit" para corregir la razón de una infracción.
 *
 * Alcance: solo cambia `reason` y `editedOn`; la fecha de creación no se toca.
 */
import type { GuildCommandContext } from "seyfert";
import { createIntegerOption, createStringOption, Declare, Options, SubCommand } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { editedEmbed } from "@/modules/moderation/views";
import { identityOf, replyError } from "../shared";

const options = {
  id: createIntegerOption({
    description: "Infraction ID",
    required: true,
    min_value: 1,
  }),
  reason: createStringOption({
    description: "New reason",
    required: true,
  }),
};

@Declare({
  name: "edit",
  description: "Change the reason of an infraction",
})
@Options(options)
export default class InfractionEditCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const result = await ctx
        .getModeration()
        .ledger.edit(ctx.guildId, identityOf(ctx.author), ctx.options.id, ctx.options.reason);
      if (result.isErr()) return replyError(ctx, result.error);
      await ctx.editOrReply({ embeds: [editedEmbed(result.unwrap())] });
    });
  }
}
