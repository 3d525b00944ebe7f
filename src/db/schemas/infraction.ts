/**
 * Zod schemas for the `infractions` and `counters` collections.
 * Purpose: single definition of the stored shape, applied to every read.
 */
import { z } from "zod";
import { INFRACTION_TYPES } from "@/modules/moderation/types";

export const INFRACTIONS_COLLECTION = "infractions";
export const COUNTERS_COLLECTION = "counters";
/** `_id` of the counter document that hands out infraction ids. */
export const INFRACTION_SEQUENCE = "infractions";

export const InfractionDocumentSchema = z.object({
  _id: z.number().int().positive(),
  type: z.enum(INFRACTION_TYPES),
  guildId: z.string(),
  userId: z.string(),
  moderatorId: z.string(),
  reason: z.string().default(""),
  createdOn: z.coerce.date(),
  editedOn: z.coerce.date().nullable().default(null),
});

export type InfractionDocument = z.infer<typeof InfractionDocumentSchema>;

export const CounterDocumentSchema = z.object({
  _id: z.string(),
  seq: z.number().int().nonnegative(),
});

export type CounterDocument = z.infer<typeof CounterDocumentSchema>;
