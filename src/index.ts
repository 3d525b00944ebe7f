/**
 * Motivación: punto de arranque del bot para validar el entorno, preparar Mongo y registrar comandos y middlewares de Seyfert.
 *
 * Idea/concepto: extiende el contexto de Seyfert con los servicios de moderación (`ctx.getModeration()`) y
 * registra el guard global que corre antes de cada comando.
 *
 * Alcance: orquesta el bootstrap y la subida de comandos; no contiene reglas de negocio.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient, ParseMiddlewares } from "seyfert";
import { Client, extendContext } from "seyfert";
import { createSeyfertPlatform } from "@/adapters/seyfert";
import { getEnv } from "@/configuration/env";
import { disconnectDb, ensureIndexes } from "@/db/mongo";
import { createModerationServices, type ModerationServices } from "@/modules/moderation";
import { logger } from "@/utils/logger";
import { middlewares } from "./middlewares";

const context = extendContext((interaction) => ({
  getModeration: (): ModerationServices =>
    createModerationServices(createSeyfertPlatform(interaction.client)),
}));

const client = new Client<true>({
  context,
  globalMiddlewares: ["moderationGuard"],
});

client.setServices({
  middlewares,
});

async function bootstrap(): Promise<void> {
  logger.info("[bootstrap] Starting bot...");
  getEnv();
  await ensureIndexes();
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

bootstrap().catch(async (error: unknown) => {
  logger.fatal("[bootstrap] Failed to start bot:", error);
  await disconnectDb();
  process.exitCode = 1;
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
  interface ExtendContext extends ReturnType<typeof context> {}
  interface RegisteredMiddlewares
    extends ParseMiddlewares<typeof middlewares> {}
}
