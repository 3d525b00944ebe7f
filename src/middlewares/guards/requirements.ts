/**
 * Purpose: Single table of what each moderation command requires from its caller.
 * Context: Read by the global guard middleware, keyed by seyfert's full command
 * name ("purge user", "infraction edit", ...).
 * Invariants:
 * - Create/view commands sit on the moderator tier; anything that rewrites or
 *   removes ledger history, or changes guild config, is administrator tier.
 * - Every moderation command is guild-only.
 */
import type { CommandRequirement } from "@/modules/moderation/authorization";

const moderator = (...memberPermissions: CommandRequirement["memberPermissions"]): CommandRequirement => ({
  guildOnly: true,
  tier: "moderator",
  memberPermissions,
});

const administrator: CommandRequirement = {
  guildOnly: true,
  tier: "administrator",
  memberPermissions: [],
};

export const COMMAND_REQUIREMENTS = {
  kick: moderator("KickMembers"),
  ban: moderator("BanMembers"),
  note: moderator("ManageMessages"),
  warn: moderator("ManageMessages"),

  "purge messages": moderator("ManageMessages"),
  "purge id": moderator("ManageMessages"),
  "purge containing": moderator("ManageMessages"),
  "purge user": moderator("ManageMessages"),

  "infraction detail": moderator("ManageMessages"),
  "infraction list": moderator("ManageMessages"),
  "infraction user": moderator("ManageMessages"),
  "infraction edit": administrator,
  "infraction delete": administrator,

  "modlog set": administrator,
  "modlog clear": administrator,
} as const satisfies Record<string, CommandRequirement>;

const REQUIREMENTS: ReadonlyMap<string, CommandRequirement> = new Map(Object.entries(COMMAND_REQUIREMENTS));

/** `null` for commands outside the table (they run unguarded). */
export function requirementFor(fullCommandName: string): CommandRequirement | null {
  return REQUIREMENTS.get(fullCommandName.trim().toLowerCase()) ?? null;
}
