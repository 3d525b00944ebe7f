/**
 * Typing contract for per-guild configuration slices.
 *
 * Role in system:
 * - Each slice pairs a ConfigurableModule key with a Zod schema that applies
 *   defaults and validation, and with the section path it is stored under.
 * - Callers hand the definition object to ConfigStore, so the value type flows
 *   from the schema without casts.
 *
 * Gotchas:
 * - Paths are not validated against stored data; a mismatched path reads as
 *   "nothing stored" and the schema defaults apply.
 */
import { z, type ZodType, type ZodTypeDef } from "zod";
import { ConfigurableModule } from "./constants";

export { z };

export type ConfigKey = ConfigurableModule;

export interface ConfigDefinition<T extends object> {
    readonly key: ConfigKey;
    readonly schema: ZodType<T, ZodTypeDef, unknown>;
    /** Section inside the guild config document. Defaults to the key. */
    readonly path: string;
}

/**
 * Declare a config slice.
 *
 * @param key Stable ConfigurableModule value.
 * @param schema Zod schema; `schema.parse({})` must yield a complete default.
 */
export function defineConfig<T extends object>(
    key: ConfigKey,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: { path?: string } = {},
): ConfigDefinition<T> {
    return { key, schema, path: options.path ?? key };
}
