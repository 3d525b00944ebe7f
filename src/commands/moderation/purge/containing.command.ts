/**
 * Motivación: registrar "purge containing" para borrar mensajes que contienen un texto exacto (distingue mayúsculas).
 */
import type { GuildCommandContext } from "seyfert";
import { createIntegerOption, createStringOption, Declare, Options, SubCommand } from "seyfert";
import { safeModerationRun } from "@/modules/moderation";
import { runPurge } from "./shared";

const options = {
  amount: createIntegerOption({
    description: "Number of recent messages to scan",
    required: true,
    min_value: 1,
  }),
  text: createStringOption({
    description: "Text the messages must contain (case-sensitive)",
    required: true,
  }),
};

@Declare({
  name: "containing",
  description: "Delete messages containing the given text",
})
@Options(options)
export default class PurgeContainingCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, () =>
      runPurge(ctx, { kind: "containing", limit: ctx.options.amount, text: ctx.options.text }),
    );
  }
}
