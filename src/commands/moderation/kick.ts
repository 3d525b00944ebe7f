/**
 * Motivación: registrar el comando "moderation / kick" para expulsar a un miembro y dejar constancia en el historial.
 *
 * Alcance: maneja la invocación y respuesta; la jerarquía, la acción y el registro viven en el dispatcher.
 */
import type { GuildCommandContext } from "seyfert";
import { Command, createStringOption, createUserOption, Declare, Options } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { runSanction } from "./shared";

const options = {
  user: createUserOption({
    description: "Member to kick",
    required: true,
  }),
  reason: createStringOption({
    description: "Reason for the kick",
    required: false,
  }),
};

@Declare({
  name: "kick",
  description: "Kick a member from the server",
  defaultMemberPermissions: ["KickMembers"],
  botPermissions: ["KickMembers"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class KickCommand extends Command {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, () => runSanction(ctx, "kick", ctx.options.user, ctx.options.reason));
  }
}
