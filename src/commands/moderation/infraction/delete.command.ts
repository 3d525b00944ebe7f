/**
 * Motivación: registrar "infraction delete" para eliminar una infracción del historial.
 *
 * Alcance: el ID eliminado no se reutiliza.
 */
import type { GuildCommandContext } from "seyfert";
import { createIntegerOption, Declare, Options, SubCommand } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { deletedEmbed } from "@/modules/moderation/views";
import { identityOf, replyError } from "../shared";

const options = {
  id: createIntegerOption({
    description: "Infraction ID",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "delete",
  description: "Delete an infraction",
})
@Options(options)
export default class InfractionDeleteCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const result = await ctx.getModeration().ledger.remove(ctx.guildId, identityOf(ctx.author), ctx.options.id);
      if (result.isErr()) return replyError(ctx, result.error);
      await ctx.editOrReply({ embeds: [deletedEmbed(result.unwrap().id)] });
    });
  }
}
