/**
 * Motivación: registrar "infraction user" para ver el historial de un usuario agrupado por tipo.
 */
import type { GuildCommandContext } from "seyfert";
import { createUserOption, Declare, Options, SubCommand } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { historyEmbed } from "@/modules/moderation/views";
import { identityOf, replyError } from "../shared";

const options = {
  user: createUserOption({
    description: "User to look up",
    required: true,
  }),
};

@Declare({
  name: "user",
  description: "Show a user's infraction history",
})
@Options(options)
export default class InfractionUserCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const user = identityOf(ctx.options.user);
      const result = await ctx.getModeration().ledger.history(ctx.guildId, user.id);
      if (result.isErr()) return replyError(ctx, result.error);
      await ctx.editOrReply({ embeds: [historyEmbed(user, result.unwrap())] });
    });
  }
}
