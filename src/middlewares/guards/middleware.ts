/**
 * Purpose: Run the moderation pre-dispatch guard before any command body.
 * Context: Global middleware in the command pipeline.
 * Dependencies: requirement table, `evaluateGuard` (pure decision).
 * Invariants:
 * - Guild-only checks happen before permission checks (inside `evaluateGuard`).
 * - A denied command never reaches `run()`.
 * Gotchas:
 * - stop() triggers onMiddlewaresError; the denial reply is sent here, so
 *   commands must not reply again for the same reason.
 */
import { createMiddleware } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { evaluateGuard, type ModerationPermission } from "@/modules/moderation/authorization";
import { requirementFor } from "./requirements";

export const moderationGuard = createMiddleware<void>(async (middle) => {
  const context = middle.context;
  if (!context.isChat()) return middle.next();

  const requirement = requirementFor(context.fullCommandName);
  // Commands outside the table opt out of the guard.
  if (!requirement) return middle.next();

  const member = context.member;
  const decision = evaluateGuard(requirement, {
    inGuild: Boolean(context.guildId),
    has: (permission: ModerationPermission) => member?.permissions.has([permission]) === true,
  });

  if (decision.allowed) return middle.next();

  context.client.logger.debug(
    `[guard] denied ${context.fullCommandName} for ${context.author.id}: ${decision.code}`,
  );
  await context.write({
    content: `❌ ${decision.reason}`,
    flags: MessageFlags.Ephemeral,
  });
  return middle.stop(decision.reason);
});
