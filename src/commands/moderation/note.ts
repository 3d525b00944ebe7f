/**
 * Motivación: registrar el comando "moderation / note" para anotar algo sobre un usuario sin sancionarlo.
 */
import type { GuildCommandContext } from "seyfert";
import { Command, createStringOption, createUserOption, Declare, Options } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { recordedEmbed } from "@/modules/moderation/views";
import { identityOf, replyError } from "./shared";

const options = {
  user: createUserOption({
    description: "User to add the note to",
    required: true,
  }),
  text: createStringOption({
    description: "Content of the note",
    required: true,
  }),
};

@Declare({
  name: "note",
  description: "Add a note to a user's infraction history",
  defaultMemberPermissions: ["ManageMessages"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class NoteCommand extends Command {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const target = identityOf(ctx.options.user);
      const result = await ctx.getModeration().ledger.record({
        type: "note",
        guildId: ctx.guildId,
        actor: identityOf(ctx.author),
        target,
        reason: ctx.options.text,
      });

      if (result.isErr()) return replyError(ctx, result.error);
      await ctx.editOrReply({ embeds: [recordedEmbed(result.unwrap(), target)] });
    });
  }
}
