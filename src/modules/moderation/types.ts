/**
 * Moderation Types.
 *
 * Purpose: Domain types shared by the ledger, the dispatcher and the purge engine.
 * Encaje: Used by repositories (persistence shape), services (Result payloads)
 * and views (rendering).
 */

/** Closed set of infraction kinds, in canonical display order. */
export const INFRACTION_TYPES = ["note", "warning", "mute", "kick", "ban"] as const;

export type InfractionType = (typeof INFRACTION_TYPES)[number];

export const isInfractionType = (value: string): value is InfractionType =>
  INFRACTION_TYPES.some((type) => type === value);

/** A persisted ledger entry. */
export interface InfractionRecord {
  /** Store-assigned, monotonic across every guild, never reused. */
  readonly id: number;
  readonly type: InfractionType;
  readonly guildId: string;
  /** Target. May no longer resolve to a known user. */
  readonly userId: string;
  /** Issuer. May no longer resolve to a known user. */
  readonly moderatorId: string;
  /** Empty string when a kick/ban was issued without a reason. */
  readonly reason: string;
  readonly createdOn: Date;
  /** null until the first edit. */
  readonly editedOn: Date | null;
}

/** Insert payload; the store fills `id`, `createdOn` and `editedOn`. */
export interface NewInfraction {
  readonly type: InfractionType;
  readonly guildId: string;
  readonly userId: string;
  readonly moderatorId: string;
  readonly reason: string;
}

/** Error codes for moderation operations. */
export type ModerationErrorCode =
  | "AUTHORIZATION_DENIED"
  | "NOT_FOUND"
  | "USAGE"
  | "PLATFORM_ACTION_FAILED"
  | "STORE_FAILED"
  | "PARTIAL_CONSISTENCY";

/** Error class for moderation operations. */
export class ModerationError extends Error {
  constructor(
    public readonly code: ModerationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ModerationError";
  }
}

/** Display identity of a user or member, as far as the platform can resolve it. */
export interface UserIdentity {
  readonly id: string;
  /** e.g. `name` or `name#1234`. */
  readonly tag: string;
  readonly avatarUrl?: string;
}

/** Who issued a command. */
export type Actor = UserIdentity;
