import type { GuildCommandContext } from "seyfert";
import type { PurgeFilter } from "@/modules/moderation";
import { purgeEmbed } from "@/modules/moderation/views";
import { identityOf, replyError } from "../shared";

/** Runs one purge in the invoking channel and answers ephemerally. */
export async function runPurge(ctx: GuildCommandContext, filter: PurgeFilter): Promise<void> {
  await ctx.deferReply(true);

  const result = await ctx.getModeration().purge.purge({
    guildId: ctx.guildId,
    channelId: ctx.channelId,
    actor: identityOf(ctx.author),
    filter,
  });

  if (result.isErr()) return replyError(ctx, result.error);
  await ctx.editOrReply({ embeds: [purgeEmbed(result.unwrap())] });
}
