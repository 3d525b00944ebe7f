/**
 * Purge Filter Engine.
 *
 * Purpose: scan a bounded window of channel history newest-first and bulk-delete
 * the messages matching one filter.
 *
 * Invariants:
 * - At most `scanLimit` messages are scanned; order beyond recency is whatever
 *   the platform returns.
 * - Usage errors (empty target set, empty text, non-positive amount) are raised
 *   before any history is fetched.
 * - Messages past the platform's bulk-delete age ceiling are skipped, not
 *   deleted one by one; the report counts only what was actually removed.
 */
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { logger } from "@/utils/logger";
import { describeUser, noopModLog, type ModLogEmitter } from "./modlog";
import type { ChannelMessage, MessageHistory } from "./platform";
import { ModerationError, type Actor, type UserIdentity } from "./types";

export const DEFAULT_PURGE_LIMIT = 100;
/** Fixed scan window for purging by raw author id. */
export const AUTHOR_ID_SCAN_LIMIT = 1000;
export const HISTORY_PAGE_SIZE = 100;
export const BULK_DELETE_CHUNK_SIZE = 100;
/** Discord refuses to bulk-delete messages older than 14 days. */
export const BULK_DELETE_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000;

export type PurgeFilter =
  | { readonly kind: "recent"; readonly limit?: number }
  | { readonly kind: "author-ids"; readonly authorIds: readonly string[] }
  | { readonly kind: "containing"; readonly limit: number; readonly text: string }
  | { readonly kind: "members"; readonly limit: number; readonly members: readonly UserIdentity[] };

export interface PurgePlan {
  readonly filter: PurgeFilter;
  readonly scanLimit: number;
  matches(message: ChannelMessage): boolean;
}

export interface PurgeReport {
  readonly filter: PurgeFilter;
  readonly scanned: number;
  readonly matched: number;
  /** Matched but past the bulk-delete age ceiling. */
  readonly skippedTooOld: number;
  readonly removed: number;
}

const usage = (message: string): Result<PurgePlan, ModerationError> =>
  ErrResult(new ModerationError("USAGE", message));

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * Validates a filter and turns it into a scan limit plus predicate.
 */
export function planPurge(filter: PurgeFilter): Result<PurgePlan, ModerationError> {
  switch (filter.kind) {
    case "recent": {
      const limit = filter.limit ?? DEFAULT_PURGE_LIMIT;
      if (!isPositiveInteger(limit)) return usage("The amount of messages must be a positive whole number.");
      return OkResult({ filter, scanLimit: limit, matches: () => true });
    }
    case "author-ids": {
      if (filter.authorIds.length === 0) return usage("You need to specify at least one ID to purge.");
      const ids = new Set(filter.authorIds);
      return OkResult({
        filter,
        scanLimit: AUTHOR_ID_SCAN_LIMIT,
        matches: (message) => ids.has(message.authorId),
      });
    }
    case "containing": {
      if (!isPositiveInteger(filter.limit)) return usage("The amount of messages must be a positive whole number.");
      if (filter.text.length === 0) return usage("You need to specify the message content to purge.");
      const needle = filter.text;
      return OkResult({
        filter,
        scanLimit: filter.limit,
        matches: (message) => message.content.includes(needle),
      });
    }
    case "members": {
      if (!isPositiveInteger(filter.limit)) return usage("The amount of messages must be a positive whole number.");
      if (filter.members.length === 0) return usage("You need to mention at least one User to purge.");
      const ids = new Set(filter.members.map((member) => member.id));
      return OkResult({
        filter,
        scanLimit: filter.limit,
        matches: (message) => ids.has(message.authorId),
      });
    }
  }
}

/** Human-readable echo of the criteria; null for an unconditional purge. */
export function describePurgeCriteria(filter: PurgeFilter): string | null {
  switch (filter.kind) {
    case "recent":
      return null;
    case "author-ids":
      return `Affected IDs: ${filter.authorIds.map((id) => `\`${id}\``).join(", ")}`;
    case "containing":
      return `Specified message content: \`${filter.text}\`.`;
    case "members":
      return `Affected users: ${filter.members.map(describeUser).join(", ")}`;
  }
}

export interface PurgeRequest {
  readonly guildId: string;
  readonly channelId: string;
  readonly actor: Actor;
  readonly filter: PurgeFilter;
}

export interface PurgeEngineDeps {
  readonly history: MessageHistory;
  readonly modLog?: ModLogEmitter;
  readonly now?: () => number;
}

export class PurgeEngine {
  private readonly history: MessageHistory;
  private readonly modLog: ModLogEmitter;
  private readonly now: () => number;

  constructor(deps: PurgeEngineDeps) {
    this.history = deps.history;
    this.modLog = deps.modLog ?? noopModLog;
    this.now = deps.now ?? Date.now;
  }

  async purge(request: PurgeRequest): Promise<Result<PurgeReport, ModerationError>> {
    const planned = planPurge(request.filter);
    if (planned.isErr()) return ErrResult(planned.error);
    const plan = planned.unwrap();

    const scan = await this.scan(request.channelId, plan);
    if (scan.isErr()) return ErrResult(scan.error);
    const { scanned, matched } = scan.unwrap();

    const cutoff = this.now() - BULK_DELETE_MAX_AGE_MS;
    const deletable = matched.filter((message) => message.createdAt > cutoff);
    const reason = `Purged by ${request.actor.tag} (${request.actor.id})`;

    let removed = 0;
    for (let i = 0; i < deletable.length; i += BULK_DELETE_CHUNK_SIZE) {
      const chunk = deletable.slice(i, i + BULK_DELETE_CHUNK_SIZE).map((message) => message.id);
      try {
        removed += await this.history.bulkDelete(request.channelId, chunk, reason);
      } catch (error) {
        logger.error("[purge] bulk delete failed", {
          channelId: request.channelId,
          removedSoFar: removed,
          error: toError(error).message,
        });
        return ErrResult(
          new ModerationError(
            "PLATFORM_ACTION_FAILED",
            `Purging failed after removing ${removed} messages. Discord may have rejected the request.`,
            { cause: error },
          ),
        );
      }
    }

    const criteria = describePurgeCriteria(request.filter);
    await this.modLog.emit(
      request.guildId,
      "MESSAGE_CLEAN",
      `${describeUser(request.actor)} purged ${removed} messages in <#${request.channelId}>` +
        (criteria ? ` (${criteria})` : ""),
    );

    return OkResult({
      filter: request.filter,
      scanned,
      matched: matched.length,
      skippedTooOld: matched.length - deletable.length,
      removed,
    });
  }

  private async scan(
    channelId: string,
    plan: PurgePlan,
  ): Promise<Result<{ scanned: number; matched: ChannelMessage[] }, ModerationError>> {
    const matched: ChannelMessage[] = [];
    let scanned = 0;
    let before: string | undefined;

    try {
      while (scanned < plan.scanLimit) {
        const limit = Math.min(HISTORY_PAGE_SIZE, plan.scanLimit - scanned);
        const page = await this.history.fetchPage(channelId, before ? { limit, before } : { limit });
        if (page.length === 0) break;

        for (const message of page.slice(0, plan.scanLimit - scanned)) {
          scanned += 1;
          if (plan.matches(message)) matched.push(message);
        }

        if (page.length < limit) break;
        before = page[page.length - 1].id;
      }
    } catch (error) {
      logger.error("[purge] history fetch failed", { channelId, error: toError(error).message });
      return ErrResult(
        new ModerationError(
          "PLATFORM_ACTION_FAILED",
          "Could not read the message history of this channel.",
          { cause: error },
        ),
      );
    }

    return OkResult({ scanned, matched });
  }
}
