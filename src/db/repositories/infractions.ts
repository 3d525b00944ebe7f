/**
 * Repositorio de infracciones (colección `infractions`).
 *
 * Responsabilidad:
 * - Asignar ids monotónicos vía el contador `counters.infractions` (`$inc` atómico).
 * - Validar cada documento leído con `InfractionDocumentSchema`; documentos inválidos
 *   se registran en el log y se omiten.
 * - Acotar toda escritura/lectura puntual por `(guildId, _id)`.
 *
 * @remarks
 * Borrar una infracción nunca decrementa el contador: los ids no se reutilizan.
 */
import type { Collection, Db, Filter } from "mongodb";
import { getDb } from "@/db/mongo";
import {
  COUNTERS_COLLECTION,
  INFRACTIONS_COLLECTION,
  INFRACTION_SEQUENCE,
  InfractionDocumentSchema,
  type CounterDocument,
  type InfractionDocument,
} from "@/db/schemas/infraction";
import type { InfractionRepository } from "@/modules/moderation/repository";
import type {
  InfractionRecord,
  InfractionType,
  NewInfraction,
} from "@/modules/moderation/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { logger } from "@/utils/logger";

const toRecord = (doc: InfractionDocument): InfractionRecord => ({
  id: doc._id,
  type: doc.type,
  guildId: doc.guildId,
  userId: doc.userId,
  moderatorId: doc.moderatorId,
  reason: doc.reason,
  createdOn: doc.createdOn,
  editedOn: doc.editedOn,
});

export class MongoInfractionRepository implements InfractionRepository {
  constructor(private readonly db: () => Promise<Db> = getDb) {}

  private async infractions(): Promise<Collection<InfractionDocument>> {
    return (await this.db()).collection<InfractionDocument>(INFRACTIONS_COLLECTION);
  }

  private async counters(): Promise<Collection<CounterDocument>> {
    return (await this.db()).collection<CounterDocument>(COUNTERS_COLLECTION);
  }

  private parse(doc: unknown): InfractionRecord | null {
    const parsed = InfractionDocumentSchema.safeParse(doc);
    if (parsed.success) return toRecord(parsed.data);
    logger.error(`[infractions] invalid document skipped: ${parsed.error.message}`);
    return null;
  }

  private parseMany(docs: unknown[]): InfractionRecord[] {
    const records: InfractionRecord[] = [];
    for (const doc of docs) {
      const record = this.parse(doc);
      if (record) records.push(record);
    }
    return records;
  }

  private async nextId(): Promise<number> {
    const counters = await this.counters();
    const counter = await counters.findOneAndUpdate(
      { _id: INFRACTION_SEQUENCE },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: "after" },
    );
    if (!counter) {
      throw new Error("Infraction id sequence did not return a value");
    }
    return counter.seq;
  }

  async insert(input: NewInfraction): Promise<Result<InfractionRecord>> {
    try {
      const doc: InfractionDocument = {
        _id: await this.nextId(),
        type: input.type,
        guildId: input.guildId,
        userId: input.userId,
        moderatorId: input.moderatorId,
        reason: input.reason,
        createdOn: new Date(),
        editedOn: null,
      };
      await (await this.infractions()).insertOne(doc);
      return OkResult(toRecord(doc));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async updateReason(
    guildId: string,
    id: number,
    reason: string,
    editedOn: Date,
  ): Promise<Result<number>> {
    try {
      const res = await (await this.infractions()).updateOne(
        { _id: id, guildId },
        { $set: { reason, editedOn } },
      );
      return OkResult(res.matchedCount);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async remove(guildId: string, id: number): Promise<Result<number>> {
    try {
      const res = await (await this.infractions()).deleteOne({ _id: id, guildId });
      return OkResult(res.deletedCount);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async findOne(guildId: string, id: number): Promise<Result<InfractionRecord | null>> {
    try {
      const doc = await (await this.infractions()).findOne({ _id: id, guildId });
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async list(
    guildId: string,
    types?: readonly InfractionType[],
  ): Promise<Result<InfractionRecord[]>> {
    const filter: Filter<InfractionDocument> =
      types && types.length > 0 ? { guildId, type: { $in: [...types] } } : { guildId };
    try {
      const docs = await (await this.infractions())
        .find(filter)
        .sort({ createdOn: 1, _id: 1 })
        .toArray();
      return OkResult(this.parseMany(docs));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async listForUser(guildId: string, userId: string): Promise<Result<InfractionRecord[]>> {
    try {
      const docs = await (await this.infractions())
        .find({ guildId, userId })
        .sort({ createdOn: 1, _id: 1 })
        .toArray();
      return OkResult(this.parseMany(docs));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const infractionRepo = new MongoInfractionRepository();
