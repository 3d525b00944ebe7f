import type { GuildCommandContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { toError } from "@/utils/result";

/**
 * Runs a command body and answers with a generic ephemeral message when it
 * throws. Expected failures travel as `Result` values and never reach here.
 */
export async function safeModerationRun(ctx: GuildCommandContext, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    ctx.client.logger.error("[moderation] unhandled error in command run()", {
      command: ctx.fullCommandName,
      guildId: ctx.guildId,
      error: toError(error).message,
    });
    try {
      await ctx.editOrReply({
        flags: MessageFlags.Ephemeral,
        content: "An unexpected error occurred while processing the command.",
      });
    } catch (replyError) {
      ctx.client.logger.warn("[moderation] error reply could not be sent", toError(replyError).message);
    }
  }
}
