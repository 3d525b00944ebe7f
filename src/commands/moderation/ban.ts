/**
 * Motivación: registrar el comando "moderation / ban" para banear a un miembro y dejar constancia en el historial.
 *
 * Alcance: maneja la invocación y respuesta; el ban borra los mensajes de los últimos 7 días del usuario.
 */
import type { GuildCommandContext } from "seyfert";
import { Command, createStringOption, createUserOption, Declare, Options } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { runSanction } from "./shared";

const options = {
  user: createUserOption({
    description: "Member to ban",
    required: true,
  }),
  reason: createStringOption({
    description: "Reason for the ban",
    required: false,
  }),
};

@Declare({
  name: "ban",
  description: "Ban a member from the server",
  defaultMemberPermissions: ["BanMembers"],
  botPermissions: ["BanMembers"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class BanCommand extends Command {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, () => runSanction(ctx, "ban", ctx.options.user, ctx.options.reason));
  }
}
