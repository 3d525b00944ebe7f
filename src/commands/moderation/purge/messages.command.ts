/**
 * Motivación: registrar "purge messages" para borrar los últimos N mensajes sin filtro.
 */
import type { GuildCommandContext } from "seyfert";
import { createIntegerOption, Declare, Options, SubCommand } from "seyfert";
import { DEFAULT_PURGE_LIMIT, safeModerationRun } from "@/modules/moderation";
import { runPurge } from "./shared";

const options = {
  amount: createIntegerOption({
    description: `Number of recent messages to delete (default ${DEFAULT_PURGE_LIMIT})`,
    required: false,
    min_value: 1,
  }),
};

@Declare({
  name: "messages",
  description: "Delete the most recent messages in this channel",
})
@Options(options)
export default class PurgeMessagesCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, () =>
      runPurge(ctx, { kind: "recent", limit: ctx.options.amount ?? DEFAULT_PURGE_LIMIT }),
    );
  }
}
