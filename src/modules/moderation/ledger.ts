/**
 * Ledger Service.
 *
 * Purpose: Create, audit and curate infraction records for a guild.
 * Context: Backs `note`, `warn` and every `infraction` subcommand; the sanction
 * dispatcher also writes through `record`.
 * Dependencies: InfractionRepository (store), UserDirectory (identity
 * resolution), ModLogEmitter.
 *
 * Invariants:
 * - Every lookup, edit and delete is scoped by `(guildId, id)`; an id from
 *   another guild reads as NOT_FOUND.
 * - `createdOn` is never written after insert; edits touch `reason` + `editedOn` only.
 * - Unresolvable users are reported as `null` identities, never dereferenced.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { logger } from "@/utils/logger";
import { describeUser, noopModLog, type ModLogEmitter } from "./modlog";
import type { UserDirectory } from "./platform";
import type { InfractionRepository } from "./repository";
import {
  INFRACTION_TYPES,
  ModerationError,
  type Actor,
  type InfractionRecord,
  type InfractionType,
  type UserIdentity,
} from "./types";

/** Types whose commands require a non-empty reason. */
const REASON_REQUIRED: ReadonlySet<InfractionType> = new Set(["note", "warning", "mute"]);

export interface RecordInfractionInput {
  readonly type: InfractionType;
  readonly guildId: string;
  readonly actor: Actor;
  readonly target: UserIdentity;
  readonly reason: string;
}

export interface EditedInfraction {
  readonly id: number;
  readonly reason: string;
  readonly editedOn: Date;
}

export interface InfractionDetail {
  readonly record: InfractionRecord;
  readonly user: UserIdentity | null;
  readonly moderator: UserIdentity | null;
}

export interface ListedInfraction {
  readonly record: InfractionRecord;
  readonly user: UserIdentity | null;
}

export interface HistorySection {
  readonly type: InfractionType;
  readonly entries: readonly InfractionRecord[];
}

export interface UserHistory {
  readonly total: number;
  readonly mostRecent: InfractionRecord;
  readonly sections: readonly HistorySection[];
}

// =============================================================================
// Pure helpers
// =============================================================================

const typeOrder = (type: InfractionType): number => INFRACTION_TYPES.indexOf(type);

/**
 * Orders records by canonical type order, then by creation time, then id.
 * Returns a new array.
 */
export function sortForHistory(records: readonly InfractionRecord[]): InfractionRecord[] {
  return [...records].sort(
    (a, b) =>
      typeOrder(a.type) - typeOrder(b.type) ||
      a.createdOn.getTime() - b.createdOn.getTime() ||
      a.id - b.id,
  );
}

/**
 * Stable bucketing by type. Sections come out in canonical type order and
 * keep the relative order of their entries; empty types are omitted.
 */
export function bucketByType(records: readonly InfractionRecord[]): HistorySection[] {
  const buckets = new Map<InfractionType, InfractionRecord[]>();
  for (const record of records) {
    const bucket = buckets.get(record.type);
    if (bucket) bucket.push(record);
    else buckets.set(record.type, [record]);
  }

  const sections: HistorySection[] = [];
  for (const type of INFRACTION_TYPES) {
    const entries = buckets.get(type);
    if (entries) sections.push({ type, entries });
  }
  return sections;
}

/** Record with the greatest `createdOn`; the first one wins a tie. */
export function findMostRecent(records: readonly InfractionRecord[]): InfractionRecord | null {
  let latest: InfractionRecord | null = null;
  for (const record of records) {
    if (!latest || record.createdOn.getTime() > latest.createdOn.getTime()) {
      latest = record;
    }
  }
  return latest;
}

// =============================================================================
// Service
// =============================================================================

export interface LedgerServiceDeps {
  readonly repo: InfractionRepository;
  readonly users: UserDirectory;
  readonly modLog?: ModLogEmitter;
  readonly now?: () => Date;
}

const storeFailure = (operation: string, cause: Error): ModerationError => {
  logger.error(`[ledger] ${operation} failed`, cause);
  return new ModerationError(
    "STORE_FAILED",
    "The infraction database could not be reached. Please try again later.",
    { cause },
  );
};

const notFound = (id: number): ModerationError =>
  new ModerationError("NOT_FOUND", `Failed to find infraction #${id} on this guild.`);

export class LedgerService {
  private readonly repo: InfractionRepository;
  private readonly users: UserDirectory;
  private readonly modLog: ModLogEmitter;
  private readonly now: () => Date;

  constructor(deps: LedgerServiceDeps) {
    this.repo = deps.repo;
    this.users = deps.users;
    this.modLog = deps.modLog ?? noopModLog;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Writes a new infraction and emits INFRACTION_CREATE.
   * Note, warning and mute require a reason; kick/ban accept "".
   */
  async record(input: RecordInfractionInput): Promise<Result<InfractionRecord, ModerationError>> {
    const reason = input.reason.trim();
    if (REASON_REQUIRED.has(input.type) && !reason) {
      return ErrResult(
        new ModerationError("USAGE", `A ${input.type} needs a reason or text.`),
      );
    }

    const inserted = await this.repo.insert({
      type: input.type,
      guildId: input.guildId,
      userId: input.target.id,
      moderatorId: input.actor.id,
      reason,
    });
    if (inserted.isErr()) return ErrResult(storeFailure("insert", inserted.error));

    const record = inserted.unwrap();
    await this.modLog.emit(
      input.guildId,
      "INFRACTION_CREATE",
      `${describeUser(input.actor)} created ${input.type} #${record.id} on ${describeUser(input.target)}` +
        (reason ? ` with reason \`${reason}\`` : ""),
    );
    return OkResult(record);
  }

  async edit(
    guildId: string,
    actor: Actor,
    id: number,
    newReason: string,
  ): Promise<Result<EditedInfraction, ModerationError>> {
    const reason = newReason.trim();
    if (!reason) {
      return ErrResult(new ModerationError("USAGE", "The new reason cannot be empty."));
    }

    const editedOn = this.now();
    const updated = await this.repo.updateReason(guildId, id, reason, editedOn);
    if (updated.isErr()) return ErrResult(storeFailure("update", updated.error));
    if (updated.unwrap() === 0) return ErrResult(notFound(id));

    await this.modLog.emit(
      guildId,
      "INFRACTION_UPDATE",
      `${describeUser(actor)} changed the reason of infraction #${id} to \`${reason}\``,
    );
    return OkResult({ id, reason, editedOn });
  }

  async remove(guildId: string, actor: Actor, id: number): Promise<Result<{ id: number }, ModerationError>> {
    const removed = await this.repo.remove(guildId, id);
    if (removed.isErr()) return ErrResult(storeFailure("delete", removed.error));
    if (removed.unwrap() === 0) return ErrResult(notFound(id));

    await this.modLog.emit(guildId, "INFRACTION_DELETE", `${describeUser(actor)} deleted infraction #${id}`);
    return OkResult({ id });
  }

  async detail(guildId: string, id: number): Promise<Result<InfractionDetail, ModerationError>> {
    const found = await this.repo.findOne(guildId, id);
    if (found.isErr()) return ErrResult(storeFailure("detail lookup", found.error));

    const record = found.unwrap();
    if (!record) return ErrResult(notFound(id));

    const resolve = this.resolver();
    const [user, moderator] = await Promise.all([resolve(record.userId), resolve(record.moderatorId)]);
    return OkResult({ record, user, moderator });
  }

  async list(
    guildId: string,
    types?: readonly InfractionType[],
  ): Promise<Result<ListedInfraction[], ModerationError>> {
    const listed = await this.repo.list(guildId, types);
    if (listed.isErr()) return ErrResult(storeFailure("list", listed.error));

    const resolve = this.resolver();
    const records = listed.unwrap();
    const users = await Promise.all(records.map((record) => resolve(record.userId)));
    return OkResult(records.map((record, index) => ({ record, user: users[index] ?? null })));
  }

  /** `Ok(null)` when the user has no infractions in the guild. */
  async history(guildId: string, userId: string): Promise<Result<UserHistory | null, ModerationError>> {
    const listed = await this.repo.listForUser(guildId, userId);
    if (listed.isErr()) return ErrResult(storeFailure("user history", listed.error));

    const records = listed.unwrap();
    const mostRecent = findMostRecent(records);
    if (!mostRecent) return OkResult(null);

    return OkResult({
      total: records.length,
      mostRecent,
      sections: bucketByType(sortForHistory(records)),
    });
  }

  /** Memoised per call so a list with repeated users resolves each id once. */
  private resolver(): (userId: string) => Promise<UserIdentity | null> {
    const cache = new Map<string, Promise<UserIdentity | null>>();
    return (userId) => {
      const cached = cache.get(userId);
      if (cached) return cached;
      const pending = this.users.resolve(userId).catch((error: unknown) => {
        logger.debug(`[ledger] could not resolve user ${userId}`, error);
        return null;
      });
      cache.set(userId, pending);
      return pending;
    };
  }
}
