/**
 * Observation Service
 * ===================
 *
 * Validation and persistence contract for wildlife sightings.
 * Every operation is a single request against the store; nothing is cached
 * and nothing is retried. Store failures surface as StoreError with the
 * driver error kept as `cause` for the logs.
 */

import { ObjectId } from 'mongodb';
import { InvalidIdError, NotFoundError, StoreError } from '../../common/errors.js';
import type { Clock, Logger } from '../../core/host.deps.js';
import type { ObservationStore } from './observation.repo.js';
import { parseObservationInput } from './observation.schema.js';
import type { NewObservation, ObservationDoc, ObservationView } from './observation.types.js';

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

export const MESSAGES = {
  ADD_FAILED: 'Failed to add observation',
  LIST_FAILED: 'Failed to fetch observations',
  GET_FAILED: 'Failed to fetch observation',
  DELETE_FAILED: 'Failed to delete observation',
} as const;

export interface ObservationServiceDeps {
  store: ObservationStore;
  logger: Logger;
  clock: Clock;
}

/**
 * Render a stored document for JSON output.
 */
export function toObservationView(doc: ObservationDoc): ObservationView {
  return {
    _id: doc._id.toHexString(),
    species: doc.species,
    gender: doc.gender,
    quantity: doc.quantity,
    latitude: doc.latitude,
    longitude: doc.longitude,
    userId: doc.userId,
    timestamp: doc.timestamp.toISOString(),
  };
}

/**
 * Strict 24-hex check. ObjectId.isValid also accepts any 12-character
 * string, which is not a canonical identifier.
 */
export function parseObjectId(id: string, failureMessage: string): ObjectId {
  if (!OBJECT_ID_PATTERN.test(id)) {
    throw new InvalidIdError(id, failureMessage);
  }
  return ObjectId.createFromHexString(id);
}

export class ObservationService {
  private store: ObservationStore;
  private logger: Logger;
  private clock: Clock;

  constructor(deps: ObservationServiceDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.clock = deps.clock;
  }

  /**
   * Validate the raw body, stamp it and insert it.
   * @returns generated identifier in hex form
   */
  async add(body: unknown): Promise<string> {
    const input = parseObservationInput(body);
    const doc: NewObservation = { ...input, timestamp: this.clock.utcNow() };

    const id = await this.withStore(MESSAGES.ADD_FAILED, () => this.store.insert(doc));
    const hexId = id.toHexString();

    this.logger.info(
      { id: hexId, species: doc.species, quantity: doc.quantity, userId: doc.userId },
      '[Observation] Created',
    );
    return hexId;
  }

  async listAll(): Promise<ObservationView[]> {
    return this.withStore(MESSAGES.LIST_FAILED, async () => {
      const docs = await this.store.findAll();
      return docs.map(toObservationView);
    });
  }

  async getById(id: string): Promise<ObservationView> {
    const objectId = parseObjectId(id, MESSAGES.GET_FAILED);
    // Rendering stays inside the store call: a stored document with a bad
    // timestamp fails as the operation, not as an unhandled error
    const view = await this.withStore(MESSAGES.GET_FAILED, async () => {
      const doc = await this.store.findById(objectId);
      return doc ? toObservationView(doc) : null;
    });
    if (!view) {
      throw new NotFoundError();
    }
    return view;
  }

  /**
   * Not idempotent: deleting an id twice answers NotFoundError the second time.
   */
  async deleteById(id: string): Promise<void> {
    const objectId = parseObjectId(id, MESSAGES.DELETE_FAILED);
    const deleted = await this.withStore(MESSAGES.DELETE_FAILED, () =>
      this.store.deleteById(objectId),
    );
    if (deleted === 0) {
      throw new NotFoundError();
    }
    this.logger.info({ id }, '[Observation] Deleted');
  }

  /**
   * Never throws.
   */
  async checkHealth(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (err) {
      this.logger.warn({ err }, '[Observation] Store ping failed');
      return false;
    }
  }

  private async withStore<T>(failureMessage: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw new StoreError(failureMessage, err);
    }
  }
}
