/**
 * Motivación: registrar "infraction list" para listar las infracciones del servidor, opcionalmente filtradas por tipo.
 */
import type { GuildCommandContext } from "seyfert";
import { createStringOption, Declare, Options, SubCommand } from "seyfert";
import { parseInfractionTypes, safeModerationRun } from "@/modules/moderation";
import { listEmbed } from "@/modules/moderation/views";
import { replyError } from "../shared";

const options = {
  types: createStringOption({
    description: "Only these types (note, warning, mute, kick, ban), separated by spaces or commas",
    required: false,
  }),
};

@Declare({
  name: "list",
  description: "List the infractions of this server",
})
@Options(options)
export default class InfractionListCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const parsed = parseInfractionTypes(ctx.options.types ?? "");
      if (parsed.isErr()) return replyError(ctx, parsed.error);
      const types = parsed.unwrap();

      const result = await ctx.getModeration().ledger.list(ctx.guildId, types.length ? types : undefined);
      if (result.isErr()) return replyError(ctx, result.error);

      const guild = await ctx.guild();
      await ctx.editOrReply({ embeds: [listEmbed(guild.name, result.unwrap(), types)] });
    });
  }
}
