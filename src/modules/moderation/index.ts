/**
 * Moderation module entry point.
 *
 * Wires the ledger, the sanction dispatcher and the purge engine over a set of
 * platform ports. Commands get an instance per interaction through the
 * extended context (`ctx.getModeration()`).
 */
import { configStore, type ConfigStore } from "@/configuration/store";
import { infractionRepo } from "@/db/repositories/infractions";
import { SanctionDispatcher } from "./dispatcher";
import { LedgerService } from "./ledger";
import { GuildModLog } from "./modlog";
import type { MemberActions, MessageHistory, ModLogChannel, UserDirectory } from "./platform";
import { PurgeEngine } from "./purge";
import type { InfractionRepository } from "./repository";

export interface ModerationPlatform {
  readonly members: MemberActions;
  readonly users: UserDirectory;
  readonly history: MessageHistory;
  readonly modLogChannel: ModLogChannel;
}

export interface ModerationServices {
  readonly ledger: LedgerService;
  readonly dispatcher: SanctionDispatcher;
  readonly purge: PurgeEngine;
  readonly users: UserDirectory;
}

export function createModerationServices(
  platform: ModerationPlatform,
  repo: InfractionRepository = infractionRepo,
  store: ConfigStore = configStore,
): ModerationServices {
  const modLog = new GuildModLog(platform.modLogChannel, store);
  const ledger = new LedgerService({ repo, users: platform.users, modLog });
  return {
    ledger,
    dispatcher: new SanctionDispatcher({ members: platform.members, ledger }),
    purge: new PurgeEngine({ history: platform.history, modLog }),
    users: platform.users,
  };
}

export * from "./authorization";
export * from "./catalog";
export * from "./dispatcher";
export * from "./ledger";
export * from "./modlog";
export * from "./platform";
export * from "./purge";
export * from "./repository";
export * from "./types";
export { safeModerationRun } from "./safeRun";
