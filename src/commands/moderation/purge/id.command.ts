/**
 * Motivación: registrar "purge id" para borrar mensajes de autores dados por ID, aunque ya no estén en el servidor.
 *
 * Alcance: revisa siempre los últimos 1000 mensajes del canal.
 */
import type { GuildCommandContext } from "seyfert";
import { createStringOption, Declare, Options, SubCommand } from "seyfert";
import { ModerationError, safeModerationRun } from "@/modules/moderation";
import { parseSnowflakeList } from "@/utils/snowflake";
import { replyError } from "../shared";
import { runPurge } from "./shared";

const options = {
  ids: createStringOption({
    description: "Author IDs, separated by spaces or commas",
    required: true,
  }),
};

@Declare({
  name: "id",
  description: "Delete messages by the given author IDs",
})
@Options(options)
export default class PurgeIdCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await safeModerationRun(ctx, async () => {
      const { ids, invalid } = parseSnowflakeList(ctx.options.ids);
      if (invalid.length > 0) {
        return replyError(
          ctx,
          new ModerationError("USAGE", `Not a valid ID: ${invalid.map((token) => `\`${token}\``).join(", ")}.`),
        );
      }

      await runPurge(ctx, { kind: "author-ids", authorIds: ids });
    });
  }
}
