/**
 * Process configuration read from the environment (`.env` via dotenv).
 *
 * Parsed once and cached; an invalid environment fails at bootstrap with the
 * zod issue list instead of surfacing later as a connection error.
 */
import "dotenv/config";
import { z } from "zod";

export const EnvSchema = z.object({
  MONGO_URI: z.string().min(1, "MongoDB URI not configured (MONGO_URI)."),
  DB_NAME: z.string().min(1).default("infraction_ledger"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

let cached: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export function getEnv(): Env {
  if (!cached) cached = loadEnv();
  return cached;
}
