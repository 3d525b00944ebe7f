/**
 * Presentation catalog for infraction types.
 *
 * Both tables are total over `InfractionType`: adding a variant to
 * `INFRACTION_TYPES` fails compilation here until it gets a glyph and labels.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { INFRACTION_TYPES, ModerationError, isInfractionType, type InfractionType } from "./types";

interface InfractionTypeMeta {
  readonly glyph: string;
  readonly label: string;
  readonly plural: string;
}

export const INFRACTION_TYPE_META = {
  note: { glyph: "📔", label: "Note", plural: "notes" },
  warning: { glyph: "⚠", label: "Warning", plural: "warnings" },
  mute: { glyph: "🔇", label: "Mute", plural: "mutes" },
  kick: { glyph: "👢", label: "Kick", plural: "kicks" },
  ban: { glyph: "🔨", label: "Ban", plural: "bans" },
} as const satisfies Record<InfractionType, InfractionTypeMeta>;

export const glyphOf = (type: InfractionType): string => INFRACTION_TYPE_META[type].glyph;

/** "📔 Note" */
export const labelOf = (type: InfractionType): string =>
  `${INFRACTION_TYPE_META[type].glyph} ${INFRACTION_TYPE_META[type].label}`;

/** "📔 notes" */
export const sectionTitleOf = (type: InfractionType): string =>
  `${INFRACTION_TYPE_META[type].glyph} ${INFRACTION_TYPE_META[type].plural}`;

/**
 * Parses "note, warning ban" into type names. Duplicates collapse; an unknown
 * name fails the whole list.
 */
export function parseInfractionTypes(input: string): Result<InfractionType[], ModerationError> {
  const types: InfractionType[] = [];
  for (const token of input.toLowerCase().split(/[\s,]+/)) {
    if (!token) continue;
    if (!isInfractionType(token)) {
      return ErrResult(
        new ModerationError(
          "USAGE",
          `Unknown infraction type \`${token}\`. Valid types: ${INFRACTION_TYPES.join(", ")}.`,
        ),
      );
    }
    if (!types.includes(token)) types.push(token);
  }
  return OkResult(types);
}
