/**
 * Module-level logger for code that runs outside a command context
 * (repositories, services, bootstrap). Commands use `ctx.client.logger`.
 */
import { Logger } from "seyfert";
import { LogLevels } from "seyfert/lib/common";

const LEVELS: Record<string, LogLevels> = {
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
};

export const resolveLogLevel = (value: string | undefined): LogLevels =>
  LEVELS[value?.toLowerCase() ?? "info"] ?? LogLevels.Info;

export const logger = new Logger({
  name: "[moderation]",
  logLevel: resolveLogLevel(process.env.LOG_LEVEL),
});
