/**
 * Guild configuration provider backed by Mongo (collection `guild_configs`).
 * Purpose: read/write per-guild configuration sections without exposing persistence details.
 */
import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";

export interface ConfigProvider {
    /** Raw stored section, `undefined` when nothing was ever written. */
    getConfig(guildId: string, path: string): Promise<unknown>;
    setConfig(guildId: string, path: string, partial: object): Promise<void>;
}

interface GuildConfigDocument {
    _id: string;
    [section: string]: unknown;
}

export const GUILD_CONFIGS_COLLECTION = "guild_configs";

/**
 * MongoDB implementation of the ConfigProvider.
 */
export class MongoGuildConfigProvider implements ConfigProvider {
    private async collection(): Promise<Collection<GuildConfigDocument>> {
        return (await getDb()).collection<GuildConfigDocument>(GUILD_CONFIGS_COLLECTION);
    }

    async getConfig(guildId: string, path: string): Promise<unknown> {
        const doc = await (await this.collection()).findOne({ _id: guildId });
        return doc?.[path];
    }

    async setConfig(
        guildId: string,
        path: string,
        partial: object,
    ): Promise<void> {
        const updates: Record<string, unknown> = {};
        for (const [subKey, value] of Object.entries(partial)) {
            if (value === undefined) continue;
            updates[`${path}.${subKey}`] = value;
        }

        if (!Object.keys(updates).length) return;

        // Atomic $set per field to avoid clobbering unrelated config updates.
        await (await this.collection()).updateOne(
            { _id: guildId },
            { $set: updates },
            { upsert: true },
        );
    }
}
