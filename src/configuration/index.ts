/**
 * Configuration entrypoint: process env plus the per-guild config store.
 */
export * from "./constants";
export * from "./definitions";
export * from "./env";
export * from "./provider";
export * from "./store";
