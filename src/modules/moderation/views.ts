/**
 * Responsabilidad: construir los embeds de respuesta de los comandos de moderación.
 *
 * The text builders are exported separately from the embed builders so the
 * exact lines can be checked without a client.
 */
import { Embed } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { EMBED_DESCRIPTION_LIMIT, EMBED_FIELD_LIMIT, joinWithinLimit, truncate } from "@/utils/text";
import { discordTimestamp } from "@/utils/time";
import { glyphOf, labelOf, sectionTitleOf } from "./catalog";
import type { SanctionOutcome } from "./dispatcher";
import type { EditedInfraction, InfractionDetail, ListedInfraction, UserHistory } from "./ledger";
import { describePurgeCriteria, type PurgeReport } from "./purge";
import type {
  InfractionRecord,
  InfractionType,
  ModerationError,
  ModerationErrorCode,
  UserIdentity,
} from "./types";

export const EMPTY_LIST_TEXT = "Seems like there's nothing here yet.";
export const NO_REASON_TEXT = "no reason specified";

const ERROR_TITLES = {
  AUTHORIZATION_DENIED: "⛔ Not allowed",
  NOT_FOUND: "🔍 Not found",
  USAGE: "❓ Invalid usage",
  PLATFORM_ACTION_FAILED: "❌ Action failed",
  STORE_FAILED: "💾 Database unavailable",
  PARTIAL_CONSISTENCY: "⚠ Applied but not recorded",
} as const satisfies Record<ModerationErrorCode, string>;

// =============================================================================
// Text
// =============================================================================

/** "`tag` (`id`)", or "unknown user (`id`)" when the identity is gone. */
export function formatUser(user: UserIdentity | null, id: string): string {
  return user ? `\`${user.tag}\` (\`${user.id}\`)` : `unknown user (\`${id}\`)`;
}

/** Cut to one embed field, since a slash option may carry up to 6000 characters. */
export function formatReason(reason: string): string {
  return truncate(reason, EMBED_FIELD_LIMIT) || NO_REASON_TEXT;
}

export function formatListLine({ record, user }: ListedInfraction): string {
  return `• [\`${record.id}\`] ${glyphOf(record.type)} on ${formatUser(user, record.userId)} created ${discordTimestamp(record.createdOn)}`;
}

export function formatList(entries: readonly ListedInfraction[]): string {
  return joinWithinLimit(entries.map(formatListLine), EMBED_DESCRIPTION_LIMIT) || EMPTY_LIST_TEXT;
}

export function formatListTitle(guildName: string, types?: readonly InfractionType[]): string {
  if (!types || types.length === 0) return `All infractions on ${guildName}`;
  return `Infractions with types ${types.map((type) => `\`${type}\``).join(", ")} on ${guildName}`;
}

export function formatHistoryLine(record: InfractionRecord): string {
  return `• [\`${record.id}\`] on ${discordTimestamp(record.createdOn)}`;
}

export function formatHistorySection(entries: readonly InfractionRecord[]): string {
  return joinWithinLimit(entries.map(formatHistoryLine), EMBED_FIELD_LIMIT);
}

export function formatHistoryFooter(history: UserHistory): string {
  return `total infractions: ${history.total}, most recent: #${history.mostRecent.id} at ${history.mostRecent.createdOn.toISOString()}`;
}

/** "Authored by tag (id)" or the raw-id fallback. */
export function formatAuthor(moderator: UserIdentity | null, moderatorId: string): string {
  return moderator
    ? `Authored by ${moderator.tag} (${moderator.id})`
    : `Authored by unknown author (ID: ${moderatorId})`;
}

// =============================================================================
// Embeds
// =============================================================================

export function errorEmbed(error: ModerationError): Embed {
  return new Embed({
    title: ERROR_TITLES[error.code],
    description: error.message,
    color: error.code === "PARTIAL_CONSISTENCY" ? EmbedColors.Orange : EmbedColors.Red,
  });
}

export function sanctionEmbed(outcome: SanctionOutcome): Embed {
  const { target, infraction } = outcome;
  return new Embed({
    title: `${labelOf(outcome.verb)} issued`,
    description: [
      `${outcome.verb === "ban" ? "Banned" : "Kicked"} ${formatUser(target, target.id)}.`,
      `**Reason:** ${formatReason(outcome.reason)}`,
    ].join("\n"),
    color: EmbedColors.Green,
    footer: { text: `Infraction #${infraction.id}` },
  });
}

export function recordedEmbed(record: InfractionRecord, target: UserIdentity): Embed {
  return new Embed({
    title: `${labelOf(record.type)} recorded`,
    description: `Added ${record.type} #${record.id} to ${formatUser(target, target.id)}.\n**Reason:** ${formatReason(record.reason)}`,
    color: EmbedColors.Green,
  });
}

export function editedEmbed(edited: EditedInfraction): Embed {
  return new Embed({
    title: `Successfully edited infraction #${edited.id}.`,
    description: `**New reason:** ${formatReason(edited.reason)}`,
    color: EmbedColors.Green,
    timestamp: edited.editedOn.toISOString(),
  });
}

export function deletedEmbed(id: number): Embed {
  return new Embed({
    title: `Successfully deleted infraction #${id}.`,
    color: EmbedColors.Green,
  });
}

export function detailEmbed({ record, user, moderator }: InfractionDetail): Embed {
  return new Embed({
    title: `Infraction #${record.id}`,
    color: EmbedColors.Blue,
    fields: [
      { name: "User", value: formatUser(user, record.userId), inline: true },
      { name: "Type", value: labelOf(record.type), inline: true },
      { name: "Creation", value: discordTimestamp(record.createdOn), inline: true },
      {
        name: "Last edited",
        value: record.editedOn ? discordTimestamp(record.editedOn) : "never",
        inline: true,
      },
      { name: "Reason", value: formatReason(record.reason), inline: false },
    ],
    footer: moderator?.avatarUrl
      ? { text: formatAuthor(moderator, record.moderatorId), icon_url: moderator.avatarUrl }
      : { text: formatAuthor(moderator, record.moderatorId) },
  });
}

export function listEmbed(
  guildName: string,
  entries: readonly ListedInfraction[],
  types?: readonly InfractionType[],
): Embed {
  return new Embed({
    title: formatListTitle(guildName, types),
    description: formatList(entries),
    color: EmbedColors.Blue,
  });
}

export function historyEmbed(user: UserIdentity, history: UserHistory | null): Embed {
  if (!history) {
    return new Embed({
      title: `No recorded infractions for ${formatUser(user, user.id)}.`,
      color: EmbedColors.Blue,
    });
  }

  return new Embed({
    title: `Infractions for ${formatUser(user, user.id)}`,
    color: EmbedColors.Blue,
    fields: history.sections.map((section) => ({
      name: sectionTitleOf(section.type),
      value: formatHistorySection(section.entries),
      inline: false,
    })),
    footer: user.avatarUrl
      ? { text: formatHistoryFooter(history), icon_url: user.avatarUrl }
      : { text: formatHistoryFooter(history) },
  });
}

export function purgeEmbed(report: PurgeReport): Embed {
  const criteria = describePurgeCriteria(report.filter);
  const lines = [`Scanned ${report.scanned} messages.`];
  if (report.skippedTooOld > 0) {
    lines.push(`Skipped ${report.skippedTooOld} messages older than 14 days.`);
  }
  if (criteria) lines.push(criteria);

  return new Embed({
    title: `Purged ${report.removed} messages.`,
    description: lines.join("\n"),
    color: EmbedColors.Green,
  });
}

export function modLogUpdatedEmbed(channelId: string | null): Embed {
  return new Embed({
    title: channelId ? "Mod log channel set" : "Mod log disabled",
    description: channelId
      ? `Moderation events will be posted in <#${channelId}>.`
      : "Moderation events will no longer be posted.",
    color: EmbedColors.Green,
  });
}
