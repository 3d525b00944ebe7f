/**
 * Unit Tests: Ledger Service
 *
 * Purpose: Record, look up, edit and delete infractions; list and per-user
 * history views; guild scoping of every id-based operation.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { LedgerService, bucketByType, findMostRecent, sortForHistory } from "@/modules/moderation/ledger";
import type { InfractionRecord } from "@/modules/moderation/types";
import { formatList } from "@/modules/moderation/views";
import {
  GUILD_ID,
  MEMBER,
  MODERATOR,
  OTHER_GUILD_ID,
  OTHER_MEMBER,
  FakeUserDirectory,
  MemoryInfractionRepository,
  RecordingModLog,
  expectErr,
} from "./_utils/fakes";

const EDITED_AT = new Date(Date.UTC(2024, 5, 1));

describe("LedgerService", () => {
  let repo: MemoryInfractionRepository;
  let modLog: RecordingModLog;
  let ledger: LedgerService;

  beforeEach(() => {
    repo = new MemoryInfractionRepository();
    modLog = new RecordingModLog();
    ledger = new LedgerService({
      repo,
      users: new FakeUserDirectory([MODERATOR, MEMBER]),
      modLog,
      now: () => EDITED_AT,
    });
  });

  const note = (reason: string, guildId = GUILD_ID, target = MEMBER) =>
    ledger.record({ type: "note", guildId, actor: MODERATOR, target, reason });

  describe("record", () => {
    it("assigns increasing ids across guilds", async () => {
      const first = (await note("first")).unwrap();
      const second = (await note("second", OTHER_GUILD_ID)).unwrap();
      const third = (await note("third")).unwrap();

      expect([first.id, second.id, third.id]).toEqual([1, 2, 3]);
    });

    it("never reuses the id of a deleted infraction", async () => {
      const first = (await note("first")).unwrap();
      await ledger.remove(GUILD_ID, MODERATOR, first.id);

      const next = (await note("second")).unwrap();
      expect(next.id).toBe(2);
    });

    it("stores a new record with no edit time", async () => {
      const record = (await note("spams links")).unwrap();

      expect(record).toMatchObject({
        type: "note",
        guildId: GUILD_ID,
        userId: MEMBER.id,
        moderatorId: MODERATOR.id,
        reason: "spams links",
        editedOn: null,
      });
    });

    it("rejects a note without text and writes nothing", async () => {
      const error = expectErr(await note("   "));

      expect(error.code).toBe("USAGE");
      expect(error.message).toBe("A note needs a reason or text.");
      expect(repo.records).toHaveLength(0);
    });

    it("accepts a kick with an empty reason", async () => {
      const result = await ledger.record({
        type: "kick",
        guildId: GUILD_ID,
        actor: MODERATOR,
        target: MEMBER,
        reason: "",
      });

      expect(result.unwrap().reason).toBe("");
    });

    it("emits INFRACTION_CREATE with the reason", async () => {
      await note("spams links");

      expect(modLog.events).toEqual([
        {
          guildId: GUILD_ID,
          event: "INFRACTION_CREATE",
          description:
            "`mod` (`200000000000000001`) created note #1 on `member` (`300000000000000001`) with reason `spams links`",
        },
      ]);
    });

    it("maps a store failure to STORE_FAILED", async () => {
      repo.failing = true;
      const error = expectErr(await note("spams links"));

      expect(error.code).toBe("STORE_FAILED");
      expect(modLog.events).toHaveLength(0);
    });
  });

  describe("note → detail → edit → delete", () => {
    it("walks one infraction through its lifecycle", async () => {
      const created = (await note("spams links")).unwrap();

      const detail = (await ledger.detail(GUILD_ID, created.id)).unwrap();
      expect(detail.record.reason).toBe("spams links");
      expect(detail.user).toEqual(MEMBER);
      expect(detail.moderator).toEqual(MODERATOR);

      const edited = (await ledger.edit(GUILD_ID, MODERATOR, created.id, "spams invite links")).unwrap();
      expect(edited).toEqual({ id: created.id, reason: "spams invite links", editedOn: EDITED_AT });

      const after = (await ledger.detail(GUILD_ID, created.id)).unwrap();
      expect(after.record.reason).toBe("spams invite links");
      expect(after.record.editedOn).toEqual(EDITED_AT);
      expect(after.record.createdOn).toEqual(created.createdOn);

      const missing = expectErr(await ledger.edit(GUILD_ID, MODERATOR, 999, "x"));
      expect(missing.code).toBe("NOT_FOUND");

      expect((await ledger.remove(GUILD_ID, MODERATOR, created.id)).unwrap()).toEqual({ id: created.id });

      const gone = expectErr(await ledger.detail(GUILD_ID, created.id));
      expect(gone.code).toBe("NOT_FOUND");
      expect(gone.message).toBe("Failed to find infraction #1 on this guild.");
    });
  });

  describe("guild scoping", () => {
    it("treats another guild's id as not found for detail, edit and delete", async () => {
      const created = (await note("spams links")).unwrap();

      expect(expectErr(await ledger.detail(OTHER_GUILD_ID, created.id)).code).toBe("NOT_FOUND");
      expect(expectErr(await ledger.edit(OTHER_GUILD_ID, MODERATOR, created.id, "changed")).code).toBe("NOT_FOUND");
      expect(expectErr(await ledger.remove(OTHER_GUILD_ID, MODERATOR, created.id)).code).toBe("NOT_FOUND");

      expect(repo.records).toEqual([created]);
    });
  });

  describe("edit", () => {
    it("rejects an empty reason", async () => {
      const created = (await note("spams links")).unwrap();
      const error = expectErr(await ledger.edit(GUILD_ID, MODERATOR, created.id, "  "));

      expect(error.code).toBe("USAGE");
      expect(repo.records[0].reason).toBe("spams links");
    });
  });

  describe("list", () => {
    it("resolves known users and leaves unknown ones null", async () => {
      await note("first");
      await note("second", GUILD_ID, OTHER_MEMBER);

      const listed = (await ledger.list(GUILD_ID)).unwrap();
      expect(listed.map((entry) => entry.user)).toEqual([MEMBER, null]);
    });

    it("renders one line per record, oldest first", async () => {
      const record = (type: "note" | "warning" | "kick", reason: string) =>
        ledger.record({ type, guildId: GUILD_ID, actor: MODERATOR, target: MEMBER, reason });

      await record("warning", "w1");
      await record("note", "n1");
      await record("kick", "");
      await note("elsewhere", OTHER_GUILD_ID);
      await record("note", "n2");
      await record("warning", "w2");

      const lines = formatList((await ledger.list(GUILD_ID)).unwrap()).split("\n");

      expect(lines).toHaveLength(5);
      expect(lines.map((line) => /^• \[`(\d+)`\]/.exec(line)?.[1])).toEqual(["1", "2", "3", "5", "6"]);
    });

    it("filters by type", async () => {
      await note("first");
      await ledger.record({ type: "warning", guildId: GUILD_ID, actor: MODERATOR, target: MEMBER, reason: "w" });

      const listed = (await ledger.list(GUILD_ID, ["warning"])).unwrap();
      expect(listed.map((entry) => entry.record.type)).toEqual(["warning"]);
    });

    it("returns an empty list for a guild without infractions", async () => {
      expect((await ledger.list(OTHER_GUILD_ID)).unwrap()).toEqual([]);
    });
  });

  describe("history", () => {
    it("is null for a user without infractions", async () => {
      expect((await ledger.history(GUILD_ID, MEMBER.id)).unwrap()).toBeNull();
    });

    it("groups by type in canonical order and reports the most recent", async () => {
      const record = (type: "note" | "warning" | "ban", reason: string) =>
        ledger.record({ type, guildId: GUILD_ID, actor: MODERATOR, target: MEMBER, reason });

      await record("warning", "w1");
      await record("note", "n1");
      await record("ban", "");
      await record("note", "n2");
      await note("elsewhere", GUILD_ID, OTHER_MEMBER);

      const history = (await ledger.history(GUILD_ID, MEMBER.id)).unwrap();
      expect(history?.total).toBe(4);
      expect(history?.mostRecent.id).toBe(4);
      expect(history?.sections.map((s) => [s.type, s.entries.map((e) => e.id)])).toEqual([
        ["note", [2, 4]],
        ["warning", [1]],
        ["ban", [3]],
      ]);
    });
  });
});

describe("history helpers", () => {
  const at = (id: number, type: InfractionRecord["type"], seconds: number): InfractionRecord => ({
    id,
    type,
    guildId: GUILD_ID,
    userId: MEMBER.id,
    moderatorId: MODERATOR.id,
    reason: "r",
    createdOn: new Date(Date.UTC(2024, 0, 1, 0, 0, seconds)),
    editedOn: null,
  });

  it("sorts by type, then creation time, then id", () => {
    const sorted = sortForHistory([at(5, "ban", 0), at(3, "note", 9), at(2, "note", 9), at(1, "note", 1)]);
    expect(sorted.map((r) => r.id)).toEqual([1, 2, 3, 5]);
  });

  it("omits types without entries", () => {
    const sections = bucketByType([at(1, "kick", 0)]);
    expect(sections).toEqual([{ type: "kick", entries: [at(1, "kick", 0)] }]);
  });

  it("picks the first record on a creation time tie", () => {
    expect(findMostRecent([at(1, "note", 5), at(2, "ban", 5), at(3, "note", 1)])?.id).toBe(1);
  });

  it("has no most recent record for an empty history", () => {
    expect(findMostRecent([])).toBeNull();
  });
});
