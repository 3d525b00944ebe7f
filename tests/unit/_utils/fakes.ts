/**
 * In-process stand-ins for the moderation ports.
 *
 * Each fake records what it was asked to do so tests can assert side effects
 * (or their absence) without Mongo or a Discord gateway.
 */
import type { ConfigProvider } from "@/configuration/provider";
import type { ModLogEmitter, ModLogEvent } from "@/modules/moderation/modlog";
import type {
  ChannelMessage,
  HierarchySnapshot,
  MemberActions,
  MessageHistory,
  ModLogChannel,
  UserDirectory,
} from "@/modules/moderation/platform";
import type { InfractionRepository } from "@/modules/moderation/repository";
import type {
  InfractionRecord,
  InfractionType,
  NewInfraction,
  UserIdentity,
} from "@/modules/moderation/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export const GUILD_ID = "100000000000000001";
export const OTHER_GUILD_ID = "100000000000000002";

export const MODERATOR: UserIdentity = { id: "200000000000000001", tag: "mod" };
export const MEMBER: UserIdentity = { id: "300000000000000001", tag: "member" };
export const OTHER_MEMBER: UserIdentity = { id: "300000000000000002", tag: "other" };

/** Unwraps an `Err`, failing the test when the result is `Ok`. */
export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.isErr()) return result.error;
  throw new Error(`expected Err, got Ok(${JSON.stringify(result.unwrap())})`);
}

/** Clock that advances one second per call, starting at `start`. */
export function tickingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let current = start;
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}

export class MemoryInfractionRepository implements InfractionRepository {
  readonly records: InfractionRecord[] = [];
  failing = false;
  private seq = 0;

  constructor(private readonly now: () => Date = tickingClock()) {}

  private offline(): Error {
    return new Error("store offline");
  }

  async insert(input: NewInfraction): Promise<Result<InfractionRecord>> {
    if (this.failing) return ErrResult(this.offline());
    this.seq += 1;
    const record: InfractionRecord = { ...input, id: this.seq, createdOn: this.now(), editedOn: null };
    this.records.push(record);
    return OkResult(record);
  }

  async updateReason(guildId: string, id: number, reason: string, editedOn: Date): Promise<Result<number>> {
    if (this.failing) return ErrResult(this.offline());
    const index = this.records.findIndex((r) => r.guildId === guildId && r.id === id);
    if (index === -1) return OkResult(0);
    this.records[index] = { ...this.records[index], reason, editedOn };
    return OkResult(1);
  }

  async remove(guildId: string, id: number): Promise<Result<number>> {
    if (this.failing) return ErrResult(this.offline());
    const index = this.records.findIndex((r) => r.guildId === guildId && r.id === id);
    if (index === -1) return OkResult(0);
    this.records.splice(index, 1);
    return OkResult(1);
  }

  async findOne(guildId: string, id: number): Promise<Result<InfractionRecord | null>> {
    if (this.failing) return ErrResult(this.offline());
    return OkResult(this.records.find((r) => r.guildId === guildId && r.id === id) ?? null);
  }

  async list(guildId: string, types?: readonly InfractionType[]): Promise<Result<InfractionRecord[]>> {
    if (this.failing) return ErrResult(this.offline());
    return OkResult(
      this.ascending(this.records.filter((r) => r.guildId === guildId && (!types || types.includes(r.type)))),
    );
  }

  async listForUser(guildId: string, userId: string): Promise<Result<InfractionRecord[]>> {
    if (this.failing) return ErrResult(this.offline());
    return OkResult(this.ascending(this.records.filter((r) => r.guildId === guildId && r.userId === userId)));
  }

  private ascending(records: InfractionRecord[]): InfractionRecord[] {
    return records.sort((a, b) => a.createdOn.getTime() - b.createdOn.getTime() || a.id - b.id);
  }
}

export class FakeUserDirectory implements UserDirectory {
  private readonly known = new Map<string, UserIdentity>();

  constructor(users: readonly UserIdentity[] = []) {
    for (const user of users) this.known.set(user.id, user);
  }

  async resolve(userId: string): Promise<UserIdentity | null> {
    return this.known.get(userId) ?? null;
  }
}

export interface MemberActionCall {
  readonly action: "kick" | "ban";
  readonly guildId: string;
  readonly userId: string;
  readonly auditReason: string;
  readonly deleteMessageSeconds?: number;
}

export class FakeMemberActions implements MemberActions {
  readonly calls: MemberActionCall[] = [];
  snapshot: HierarchySnapshot = {
    actorRank: 10,
    targetRank: 1,
    selfRank: 20,
    actorIsOwner: false,
    targetIsOwner: false,
  };
  /** When set, kick/ban reject with this error. */
  failure: Error | null = null;
  /** When set, the hierarchy lookup rejects (target not a member). */
  missingMember = false;

  async hierarchy(): Promise<HierarchySnapshot> {
    if (this.missingMember) throw new Error("Unknown Member");
    return this.snapshot;
  }

  async kick(guildId: string, userId: string, auditReason: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.calls.push({ action: "kick", guildId, userId, auditReason });
  }

  async ban(guildId: string, userId: string, auditReason: string, deleteMessageSeconds: number): Promise<void> {
    if (this.failure) throw this.failure;
    this.calls.push({ action: "ban", guildId, userId, auditReason, deleteMessageSeconds });
  }
}

/**
 * Channel history held newest-first. `fetchPage` honours `before` the way the
 * platform does: only messages strictly older than the given id's position.
 */
export class FakeMessageHistory implements MessageHistory {
  readonly fetches: { limit: number; before?: string }[] = [];
  readonly deleteBatches: string[][] = [];
  failDelete = false;

  constructor(public messages: ChannelMessage[]) {}

  async fetchPage(_channelId: string, options: { limit: number; before?: string }): Promise<ChannelMessage[]> {
    this.fetches.push(options);
    const start = options.before ? this.messages.findIndex((m) => m.id === options.before) + 1 : 0;
    return this.messages.slice(start, start + options.limit);
  }

  async bulkDelete(_channelId: string, messageIds: readonly string[]): Promise<number> {
    if (this.failDelete) throw new Error("Missing Permissions");
    this.deleteBatches.push([...messageIds]);
    this.messages = this.messages.filter((m) => !messageIds.includes(m.id));
    return messageIds.length;
  }
}

/**
 * Builds `count` messages newest-first; message `i` is `i` minutes old and
 * authored by `authorOf(i)`.
 */
export function buildHistory(
  count: number,
  now: number,
  authorOf: (index: number) => string = () => MEMBER.id,
  contentOf: (index: number) => string = (index) => `message ${index}`,
): ChannelMessage[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `9${String(count - index).padStart(17, "0")}`,
    authorId: authorOf(index),
    content: contentOf(index),
    createdAt: now - index * 60_000,
  }));
}

export class RecordingModLog implements ModLogEmitter {
  readonly events: { guildId: string; event: ModLogEvent; description: string }[] = [];

  async emit(guildId: string, event: ModLogEvent, description: string): Promise<void> {
    this.events.push({ guildId, event, description });
  }
}

export class RecordingModLogChannel implements ModLogChannel {
  readonly posts: { channelId: string; title: string; description: string }[] = [];
  failing = false;

  async post(channelId: string, title: string, description: string): Promise<void> {
    if (this.failing) throw new Error("Unknown Channel");
    this.posts.push({ channelId, title, description });
  }
}

export class MemoryConfigProvider implements ConfigProvider {
  readonly sections = new Map<string, Record<string, unknown>>();
  reads = 0;

  async getConfig(guildId: string, path: string): Promise<unknown> {
    this.reads += 1;
    return this.sections.get(`${guildId}:${path}`);
  }

  async setConfig(guildId: string, path: string, partial: object): Promise<void> {
    const key = `${guildId}:${path}`;
    this.sections.set(key, { ...this.sections.get(key), ...partial });
  }
}
