/**
 * Authorization Gate.
 *
 * Purpose: Hierarchy-safety check for member-removing actions, plus the pure
 * guard evaluation run before every moderation command.
 *
 * Invariants:
 * - A denial never carries side effects; callers must stop before any platform
 *   call or ledger write.
 * - The hierarchy check applies to kick and ban only.
 * - `administrator` tier is strictly above `moderator`.
 */
import type { HierarchySnapshot } from "./platform";

export type DenialCode = "HIERARCHY" | "SELF_TARGET" | "PERMISSION" | "GUILD_ONLY";

export type GuardDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly code: DenialCode; readonly reason: string };

export const ALLOW: GuardDecision = { allowed: true };

const deny = (code: DenialCode, reason: string): GuardDecision => ({
  allowed: false,
  code,
  reason,
});

/**
 * True when both the actor and the bot sit strictly above the target.
 * Equal rank denies.
 */
export function canActOn(actorRoleRank: number, targetRoleRank: number, selfRoleRank: number): boolean {
  return selfRoleRank > targetRoleRank && actorRoleRank > targetRoleRank;
}

export type SanctionVerb = "kick" | "ban";

/**
 * Full hierarchy check for a kick/ban request.
 *
 * The guild owner can never be targeted; when the owner is the actor only the
 * bot's own rank limits the action.
 */
export function checkHierarchy(
  verb: SanctionVerb,
  actorId: string,
  targetId: string,
  snapshot: HierarchySnapshot,
): GuardDecision {
  if (actorId === targetId) {
    return deny("SELF_TARGET", `You cannot ${verb} yourself.`);
  }

  if (snapshot.targetIsOwner || snapshot.selfRank <= snapshot.targetRank) {
    return deny(
      "HIERARCHY",
      `I cannot ${verb} any Members that are in the same or higher position in the role hierarchy as I am.`,
    );
  }

  if (!snapshot.actorIsOwner && !canActOn(snapshot.actorRank, snapshot.targetRank, snapshot.selfRank)) {
    return deny(
      "HIERARCHY",
      `You cannot ${verb} a Member that is in the same or higher position in the role hierarchy as you are.`,
    );
  }

  return ALLOW;
}

// =============================================================================
// Pre-dispatch guard
// =============================================================================

export type PermissionTier = "moderator" | "administrator";

/** Discord permission names used by the moderation commands. */
export type ModerationPermission = "ManageMessages" | "KickMembers" | "BanMembers" | "Administrator";

export interface CommandRequirement {
  readonly guildOnly: boolean;
  readonly tier: PermissionTier;
  /** Every permission listed must be held (Administrator implies all). */
  readonly memberPermissions: readonly ModerationPermission[];
}

export interface CallerPermissions {
  readonly inGuild: boolean;
  has(permission: ModerationPermission): boolean;
}

const TIER_PERMISSION: Record<PermissionTier, ModerationPermission | null> = {
  moderator: null,
  administrator: "Administrator",
};

/**
 * Pure allow/deny decision for a command invocation.
 */
export function evaluateGuard(requirement: CommandRequirement, caller: CallerPermissions): GuardDecision {
  if (requirement.guildOnly && !caller.inGuild) {
    return deny("GUILD_ONLY", "This command can only be used in a server.");
  }

  if (caller.has("Administrator")) return ALLOW;

  const tierPermission = TIER_PERMISSION[requirement.tier];
  const required = tierPermission
    ? [tierPermission, ...requirement.memberPermissions]
    : requirement.memberPermissions;

  const missing = required.filter((permission) => !caller.has(permission));
  if (missing.length > 0) {
    return deny(
      "PERMISSION",
      `You are missing the following permissions: ${missing.map((p) => `\`${p}\``).join(", ")}.`,
    );
  }

  return ALLOW;
}
