import type { ConfigDefinition } from "./definitions";
import { MongoGuildConfigProvider, type ConfigProvider } from "./provider";

const CACHE_TTL_MS = 30_000;
const MAX_CACHE_ENTRIES = 2_000;

export class ConfigStore {
    constructor(
        private readonly provider: ConfigProvider,
        private readonly now: () => number = Date.now,
    ) { }

    // Values are re-parsed on read, so callers never share a mutable instance.
    private readonly cache = new Map<string, { expiresAt: number; value: unknown }>();

    private cacheKey(guildId: string, path: string): string {
        return `${guildId}:${path}`;
    }

    private readCache<T extends object>(guildId: string, def: ConfigDefinition<T>): T | null {
        const key = this.cacheKey(guildId, def.path);
        const entry = this.cache.get(key);
        if (!entry) return null;

        if (entry.expiresAt < this.now()) {
            this.cache.delete(key);
            return null;
        }

        return def.schema.parse(entry.value);
    }

    private writeCache(guildId: string, path: string, value: unknown): void {
        this.cache.set(this.cacheKey(guildId, path), {
            expiresAt: this.now() + CACHE_TTL_MS,
            value,
        });

        if (this.cache.size <= MAX_CACHE_ENTRIES) return;
        const overflow = this.cache.size - MAX_CACHE_ENTRIES;
        for (let i = 0; i < overflow; i += 1) {
            const oldestKey = this.cache.keys().next().value;
            if (oldestKey === undefined) break;
            this.cache.delete(oldestKey);
        }
    }

    async get<T extends object>(guildId: string, def: ConfigDefinition<T>): Promise<T> {
        const cached = this.readCache(guildId, def);
        if (cached !== null) return cached;

        const raw = await this.provider.getConfig(guildId, def.path);
        // Nothing stored yet: the schema supplies the defaults.
        const result = def.schema.parse(raw ?? {});

        this.writeCache(guildId, def.path, result);
        return result;
    }

    async set<T extends object>(
        guildId: string,
        def: ConfigDefinition<T>,
        partial: Partial<T>,
    ): Promise<T> {
        const current = await this.get(guildId, def);

        // Validate the merged state before persisting only the changed fields.
        const validation = def.schema.safeParse({ ...current, ...partial });
        if (!validation.success) {
            throw new Error(`Invalid configuration update for ${def.key}: ${validation.error.message}`);
        }

        await this.provider.setConfig(guildId, def.path, partial);

        this.writeCache(guildId, def.path, validation.data);
        return validation.data;
    }
}

// Global instance
export const configStore = new ConfigStore(new MongoGuildConfigProvider());
