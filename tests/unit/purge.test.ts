/**
 * Unit Tests: Purge Filter Engine
 *
 * Purpose: bounded newest-first scans, per-filter matching, usage checks
 * before any fetch, and the bulk-delete age ceiling.
 */
import { describe, it, expect } from "vitest";
import {
  BULK_DELETE_MAX_AGE_MS,
  PurgeEngine,
  describePurgeCriteria,
  type PurgeFilter,
} from "@/modules/moderation/purge";
import type { ChannelMessage } from "@/modules/moderation/platform";
import {
  GUILD_ID,
  MEMBER,
  MODERATOR,
  OTHER_MEMBER,
  FakeMessageHistory,
  RecordingModLog,
  buildHistory,
  expectErr,
} from "./_utils/fakes";

const NOW = Date.UTC(2024, 0, 15);
const CHANNEL_ID = "400000000000000001";

function setup(messages: ChannelMessage[]) {
  const history = new FakeMessageHistory(messages);
  const modLog = new RecordingModLog();
  const engine = new PurgeEngine({ history, modLog, now: () => NOW });
  const purge = (filter: PurgeFilter) =>
    engine.purge({ guildId: GUILD_ID, channelId: CHANNEL_ID, actor: MODERATOR, filter });
  return { history, modLog, purge };
}

describe("PurgeEngine", () => {
  describe("recent", () => {
    it("deletes the 100 newest messages by default", async () => {
      const { history, purge } = setup(buildHistory(150, NOW));

      const report = (await purge({ kind: "recent" })).unwrap();

      expect(report).toMatchObject({ scanned: 100, matched: 100, removed: 100, skippedTooOld: 0 });
      expect(history.fetches).toEqual([{ limit: 100 }]);
      expect(history.messages).toHaveLength(50);
    });

    it("stops at the requested amount", async () => {
      const { history, purge } = setup(buildHistory(50, NOW));

      const report = (await purge({ kind: "recent", limit: 30 })).unwrap();

      expect(report.removed).toBe(30);
      expect(history.fetches).toEqual([{ limit: 30 }]);
    });

    it("rejects a non-positive amount before fetching", async () => {
      const { history, purge } = setup(buildHistory(10, NOW));

      const error = expectErr(await purge({ kind: "recent", limit: 0 }));

      expect(error.code).toBe("USAGE");
      expect(history.fetches).toHaveLength(0);
    });
  });

  describe("author-ids", () => {
    it("scans a fixed window of 1000 messages in pages of 100", async () => {
      const messages = buildHistory(1200, NOW, (i) => (i % 2 === 0 ? MEMBER.id : OTHER_MEMBER.id));
      const { history, purge } = setup(messages);

      const report = (await purge({ kind: "author-ids", authorIds: [MEMBER.id] })).unwrap();

      expect(report).toMatchObject({ scanned: 1000, matched: 500, removed: 500 });
      expect(history.fetches).toHaveLength(10);
      expect(history.fetches[1]).toEqual({ limit: 100, before: messages[99].id });
      expect(history.deleteBatches.map((batch) => batch.length)).toEqual([100, 100, 100, 100, 100]);
    });

    it("ends the scan when the channel runs out", async () => {
      const { history, purge } = setup(buildHistory(40, NOW));

      const report = (await purge({ kind: "author-ids", authorIds: [MEMBER.id] })).unwrap();

      expect(report.scanned).toBe(40);
      expect(history.fetches).toEqual([{ limit: 100 }]);
    });

    it("rejects an empty id set before fetching", async () => {
      const { history, purge } = setup(buildHistory(10, NOW));

      const error = expectErr(await purge({ kind: "author-ids", authorIds: [] }));

      expect(error.code).toBe("USAGE");
      expect(history.fetches).toHaveLength(0);
    });
  });

  describe("containing", () => {
    it("matches the literal text case-sensitively", async () => {
      const contents = ["Buy NOW", "buy now", "hello"];
      const { history, purge } = setup(buildHistory(9, NOW, () => MEMBER.id, (i) => contents[i % 3]));

      const report = (await purge({ kind: "containing", limit: 9, text: "NOW" })).unwrap();

      expect(report).toMatchObject({ scanned: 9, matched: 3, removed: 3 });
      expect(history.messages.map((m) => m.content)).toEqual([
        "buy now",
        "hello",
        "buy now",
        "hello",
        "buy now",
        "hello",
      ]);
    });

    it("rejects empty text before fetching", async () => {
      const { history, purge } = setup(buildHistory(10, NOW));

      const error = expectErr(await purge({ kind: "containing", limit: 10, text: "" }));

      expect(error.code).toBe("USAGE");
      expect(history.fetches).toHaveLength(0);
    });

    it("echoes the criteria to the mod log", async () => {
      const { modLog, purge } = setup(buildHistory(3, NOW, () => MEMBER.id, () => "Buy NOW"));

      await purge({ kind: "containing", limit: 3, text: "NOW" });

      expect(modLog.events).toEqual([
        {
          guildId: GUILD_ID,
          event: "MESSAGE_CLEAN",
          description:
            "`mod` (`200000000000000001`) purged 3 messages in <#400000000000000001> (Specified message content: `NOW`.)",
        },
      ]);
    });
  });

  describe("members", () => {
    it("deletes only messages by the given members", async () => {
      const { history, purge } = setup(buildHistory(10, NOW, (i) => (i < 3 ? OTHER_MEMBER.id : MEMBER.id)));

      const report = (await purge({ kind: "members", limit: 10, members: [OTHER_MEMBER] })).unwrap();

      expect(report.removed).toBe(3);
      expect(history.messages.every((m) => m.authorId === MEMBER.id)).toBe(true);
    });

    it("rejects an empty member set before fetching", async () => {
      const { history, purge } = setup(buildHistory(10, NOW));

      const error = expectErr(await purge({ kind: "members", limit: 10, members: [] }));

      expect(error.code).toBe("USAGE");
      expect(history.fetches).toHaveLength(0);
    });
  });

  it("skips messages past the bulk-delete age ceiling", async () => {
    const messages: ChannelMessage[] = [
      { id: "900000000000000003", authorId: MEMBER.id, content: "a", createdAt: NOW - 1000 },
      { id: "900000000000000002", authorId: MEMBER.id, content: "b", createdAt: NOW - 2000 },
      { id: "900000000000000001", authorId: MEMBER.id, content: "c", createdAt: NOW - BULK_DELETE_MAX_AGE_MS - 1 },
    ];
    const { history, purge } = setup(messages);

    const report = (await purge({ kind: "recent", limit: 10 })).unwrap();

    expect(report).toMatchObject({ scanned: 3, matched: 3, skippedTooOld: 1, removed: 2 });
    expect(history.deleteBatches).toEqual([["900000000000000003", "900000000000000002"]]);
  });

  it("reports a rejected delete as a platform failure", async () => {
    const { history, purge } = setup(buildHistory(5, NOW));
    history.failDelete = true;

    const error = expectErr(await purge({ kind: "recent", limit: 5 }));

    expect(error.code).toBe("PLATFORM_ACTION_FAILED");
  });
});

describe("describePurgeCriteria", () => {
  it("has nothing to say about an unconditional purge", () => {
    expect(describePurgeCriteria({ kind: "recent" })).toBeNull();
  });

  it("lists author ids", () => {
    expect(describePurgeCriteria({ kind: "author-ids", authorIds: ["1", "2"] })).toBe("Affected IDs: `1`, `2`");
  });

  it("lists members", () => {
    expect(describePurgeCriteria({ kind: "members", limit: 5, members: [MEMBER] })).toBe(
      "Affected users: `member` (`300000000000000001`)",
    );
  });
});
