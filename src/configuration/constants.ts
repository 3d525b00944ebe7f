/**
 * Canonical keys for per-guild configuration.
 *
 * Invariants:
 * - Keys are stable public identifiers; they double as the section name in the
 *   `guild_configs` document, so renaming one orphans stored data.
 */
export enum ConfigurableModule {
    Moderation = "moderation",
}
