/**
 * OBSERVATION REPOSITORY
 * ======================
 *
 * MongoDB storage for wildlife observations.
 * Insert-only: documents are never updated, only deleted by _id.
 */

import type { Collection, Db, ObjectId } from 'mongodb';
import type { NewObservation, ObservationDoc } from './observation.types.js';

export const DEFAULT_COLLECTION = 'observations';

/**
 * The four collection capabilities the service relies on, plus a ping for
 * the health endpoint. Implementations must be safe to share between
 * concurrent requests.
 */
export interface ObservationStore {
  insert(doc: NewObservation): Promise<ObjectId>;
  findAll(): Promise<ObservationDoc[]>;
  findById(id: ObjectId): Promise<ObservationDoc | null>;
  deleteById(id: ObjectId): Promise<number>;
  ping(): Promise<void>;
}

export class MongoObservationRepo implements ObservationStore {
  private col: Collection<NewObservation>;

  constructor(private db: Db, collectionName: string = DEFAULT_COLLECTION) {
    this.col = db.collection<NewObservation>(collectionName);
  }

  async insert(doc: NewObservation): Promise<ObjectId> {
    // insertOne mutates its argument with the generated _id
    const result = await this.col.insertOne({ ...doc });
    return result.insertedId;
  }

  /**
   * Natural storage order, no sort applied.
   */
  async findAll(): Promise<ObservationDoc[]> {
    return this.col.find({}).toArray();
  }

  async findById(id: ObjectId): Promise<ObservationDoc | null> {
    return this.col.findOne({ _id: id });
  }

  async deleteById(id: ObjectId): Promise<number> {
    const result = await this.col.deleteOne({ _id: id });
    return result.deletedCount;
  }

  async ping(): Promise<void> {
    await this.db.command({ ping: 1 });
  }
}
