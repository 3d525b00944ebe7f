/**
 * Motivación: helpers compartidos por los comandos de moderación (identidades, respuestas de error, kick/ban).
 *
 * Alcance: traduce entre el contexto de Seyfert y los tipos del módulo; no contiene reglas de negocio.
 */
import type { GuildCommandContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import {
  ModerationError,
  type SanctionVerb,
  type UserIdentity,
} from "@/modules/moderation";
import { errorEmbed, sanctionEmbed } from "@/modules/moderation/views";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { parseSnowflakeList } from "@/utils/snowflake";

export interface IdentitySource {
  readonly id: string;
  readonly tag: string;
  avatarURL(): string;
}

export const identityOf = (user: IdentitySource): UserIdentity => ({
  id: user.id,
  tag: user.tag,
  avatarUrl: user.avatarURL(),
});

export async function replyError(ctx: GuildCommandContext, error: ModerationError): Promise<void> {
  await ctx.editOrReply({ flags: MessageFlags.Ephemeral, embeds: [errorEmbed(error)] });
}

/** Shared body of `kick` and `ban`. */
export async function runSanction(
  ctx: GuildCommandContext,
  verb: SanctionVerb,
  target: IdentitySource,
  reason: string | undefined,
): Promise<void> {
  const result = await ctx.getModeration().dispatcher.dispatch({
    verb,
    guildId: ctx.guildId,
    actor: identityOf(ctx.author),
    target: identityOf(target),
    reason,
  });

  if (result.isErr()) return replyError(ctx, result.error);
  await ctx.editOrReply({ embeds: [sanctionEmbed(result.unwrap())] });
}

/**
 * Resolves "<@123> 456" into current members of the guild. Every token must be
 * a mention or id of someone still in the server.
 */
export async function resolveMembers(
  ctx: GuildCommandContext,
  input: string,
): Promise<Result<UserIdentity[], ModerationError>> {
  const { ids, invalid } = parseSnowflakeList(input);
  if (invalid.length > 0) {
    return ErrResult(
      new ModerationError("USAGE", `Not a user mention or ID: ${invalid.map((t) => `\`${t}\``).join(", ")}.`),
    );
  }

  const members: UserIdentity[] = [];
  for (const id of ids) {
    try {
      const member = await ctx.client.members.fetch(ctx.guildId, id);
      members.push(identityOf(member));
    } catch (error) {
      ctx.client.logger.debug(`[purge] ${id} is not a member of ${ctx.guildId}`, error);
      return ErrResult(new ModerationError("USAGE", `\`${id}\` is not a member of this server.`));
    }
  }
  return OkResult(members);
}
