/**
 * Shared pipeline for the member-removing sanctions (kick, ban).
 *
 * Provides a single execute path: validate → act → record case → report.
 * Contract: returns a `Result`, never throws. The platform call and the ledger
 * insert are causally ordered, not transactional: a failed platform action
 * writes nothing, while a ledger failure after a successful action is reported
 * as PARTIAL_CONSISTENCY and left as is.
 */
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { logger } from "@/utils/logger";
import { checkHierarchy, type SanctionVerb } from "./authorization";
import type { LedgerService } from "./ledger";
import type { HierarchySnapshot, MemberActions } from "./platform";
import { ModerationError, type Actor, type InfractionRecord, type UserIdentity } from "./types";

/** Ban deletes the last 7 days of the target's messages. */
export const BAN_DELETE_MESSAGE_SECONDS = 7 * 24 * 60 * 60;

export const NO_REASON_AUDIT = "No reason specified";

const PAST_TENSE: Record<SanctionVerb, string> = {
  kick: "Kicked",
  ban: "Banned",
};

export interface SanctionRequest {
  readonly verb: SanctionVerb;
  readonly guildId: string;
  readonly actor: Actor;
  readonly target: UserIdentity;
  /** Optional free text; "" or absent means no reason. */
  readonly reason?: string;
}

export interface SanctionOutcome {
  readonly verb: SanctionVerb;
  readonly target: UserIdentity;
  /** As stored in the ledger ("" when none was given). */
  readonly reason: string;
  readonly infraction: InfractionRecord;
}

/** Audit-log description attached to the platform action. */
export function composeAuditReason(verb: SanctionVerb, actor: Actor, reason: string): string {
  return `${PAST_TENSE[verb]} by ${actor.tag} (${actor.id}), reason: ${reason || NO_REASON_AUDIT}.`;
}

export interface SanctionDispatcherDeps {
  readonly members: MemberActions;
  readonly ledger: LedgerService;
}

export class SanctionDispatcher {
  constructor(private readonly deps: SanctionDispatcherDeps) {}

  async dispatch(request: SanctionRequest): Promise<Result<SanctionOutcome, ModerationError>> {
    const { verb, guildId, actor, target } = request;
    const reason = request.reason?.trim() ?? "";

    // --- Validate target ---

    let snapshot: HierarchySnapshot;
    try {
      snapshot = await this.deps.members.hierarchy(guildId, actor.id, target.id);
    } catch (error) {
      logger.warn(`[dispatcher] hierarchy lookup failed for ${verb}`, {
        guildId,
        targetId: target.id,
        error: toError(error).message,
      });
      return ErrResult(
        new ModerationError(
          "PLATFORM_ACTION_FAILED",
          `Could not find \`${target.tag}\` (\`${target.id}\`) as a member of this server.`,
          { cause: error },
        ),
      );
    }

    const decision = checkHierarchy(verb, actor.id, target.id, snapshot);
    if (!decision.allowed) {
      return ErrResult(new ModerationError("AUTHORIZATION_DENIED", decision.reason));
    }

    // --- Execute the platform action ---

    const auditReason = composeAuditReason(verb, actor, reason);
    try {
      if (verb === "ban") {
        await this.deps.members.ban(guildId, target.id, auditReason, BAN_DELETE_MESSAGE_SECONDS);
      } else {
        await this.deps.members.kick(guildId, target.id, auditReason);
      }
    } catch (error) {
      logger.error(`[dispatcher] ${verb} API call failed`, {
        guildId,
        targetId: target.id,
        error: toError(error).message,
      });
      return ErrResult(
        new ModerationError(
          "PLATFORM_ACTION_FAILED",
          `The ${verb} could not be completed. Discord may have rejected the request (permissions, or the user left).`,
          { cause: error },
        ),
      );
    }

    // --- Record case ---

    const recorded = await this.deps.ledger.record({ type: verb, guildId, actor, target, reason });
    if (recorded.isErr()) {
      logger.error(`[dispatcher] ${verb} applied but not recorded`, {
        guildId,
        targetId: target.id,
        error: recorded.error.message,
      });
      return ErrResult(
        new ModerationError(
          "PARTIAL_CONSISTENCY",
          `${PAST_TENSE[verb]} \`${target.tag}\` (\`${target.id}\`), but the infraction could not be recorded.`,
          { cause: recorded.error },
        ),
      );
    }

    return OkResult({ verb, target, reason, infraction: recorded.unwrap() });
  }
}
