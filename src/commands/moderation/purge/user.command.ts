/**
 * Motivación: registrar "purge user" para borrar mensajes de miembros mencionados.
 *
 * Alcance: cada mención o ID debe corresponder a un miembro actual; para autores que ya se fueron está "purge id".
 */
import type { GuildCommandContext } from "seyfert";
import { createIntegerOption, createStringOption, Declare, Options, SubCommand } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { replyError, resolveMembers } from "../shared";
import { runPurge } from "./shared";

const options = {
  amount: createIntegerOption({
    description: "Number of recent messages to scan",
    required: true,
    min_value: 1,
  }),
  users: createStringOption({
    description: "Member mentions or IDs, separated by spaces",
    required: true,
  }),
};

@Declare({
  name: "user",
  description: "Delete messages by the given members",
})
@Options(options)
export default class PurgeUserCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const members = await resolveMembers(ctx, ctx.options.users);
      if (members.isErr()) return replyError(ctx, members.error);

      await runPurge(ctx, { kind: "members", limit: ctx.options.amount, members: members.unwrap() });
    });
  }
}
