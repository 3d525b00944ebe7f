/**
 * Motivación: registrar el comando "moderation / warn" para advertir a un usuario.
 *
 * Alcance: solo registra la advertencia; no aplica ninguna acción en Discord.
 */
import type { GuildCommandContext } from "seyfert";
import { Command, createStringOption, createUserOption, Declare, Options } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { recordedEmbed } from "@/modules/moderation/views";
import { identityOf, replyError } from "./shared";

const options = {
  user: createUserOption({
    description: "User to warn",
    required: true,
  }),
  reason: createStringOption({
    description: "Reason for the warning",
    required: true,
  }),
};

@Declare({
  name: "warn",
  description: "Warn a user",
  defaultMemberPermissions: ["ManageMessages"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class WarnCommand extends Command {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const target = identityOf(ctx.options.user);
      const result = await ctx.getModeration().ledger.record({
        type: "warning",
        guildId: ctx.guildId,
        actor: identityOf(ctx.author),
        target,
        reason: ctx.options.reason,
      });

      if (result.isErr()) return replyError(ctx, result.error);
      await ctx.editOrReply({ embeds: [recordedEmbed(result.unwrap(), target)] });
    });
  }
}
