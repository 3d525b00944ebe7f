/**
 * Mongo client singleton for the native driver.
 * Purpose: single entrypoint to obtain the database handle (`getDb`), create
 * the indexes the ledger queries rely on, and close the client.
 */
import { MongoClient, type Db } from "mongodb";
import { getEnv } from "@/configuration/env";
import {
  INFRACTIONS_COLLECTION,
  type InfractionDocument,
} from "@/db/schemas/infraction";

let client: MongoClient | null = null;
let dbInstance: Db | null = null;

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  const env = getEnv();
  if (!client) {
    client = new MongoClient(env.MONGO_URI);
  }
  await client.connect();
  dbInstance = client.db(env.DB_NAME);
  return dbInstance;
}

/** Idempotent; run once at bootstrap. */
export async function ensureIndexes(): Promise<void> {
  const db = await getDb();
  const infractions = db.collection<InfractionDocument>(INFRACTIONS_COLLECTION);
  await infractions.createIndex({ guildId: 1, createdOn: 1 });
  await infractions.createIndex({ guildId: 1, userId: 1 });
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  dbInstance = null;
}
