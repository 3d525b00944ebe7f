/**
 * Infraction Record Store contract.
 *
 * Implementations: `MongoInfractionRepository` (runtime) and the in-memory fake
 * used by tests. Every operation is a single atomic statement; none throws.
 */
import type { Result } from "@/utils/result";
import type { InfractionRecord, InfractionType, NewInfraction } from "./types";

export interface InfractionRepository {
  /** Inserts and returns the stored record with its assigned id. */
  insert(input: NewInfraction): Promise<Result<InfractionRecord>>;
  /** Sets reason + editedOn. Resolves to the number of matched rows (0 or 1). */
  updateReason(guildId: string, id: number, reason: string, editedOn: Date): Promise<Result<number>>;
  /** Resolves to the number of deleted rows (0 or 1). */
  remove(guildId: string, id: number): Promise<Result<number>>;
  findOne(guildId: string, id: number): Promise<Result<InfractionRecord | null>>;
  /** Guild ledger ascending by creation time, optionally restricted to `types`. */
  list(guildId: string, types?: readonly InfractionType[]): Promise<Result<InfractionRecord[]>>;
  /** One user's records in the guild, ascending by creation time. */
  listForUser(guildId: string, userId: string): Promise<Result<InfractionRecord[]>>;
}
