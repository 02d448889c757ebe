import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ObjectId } from 'mongodb';
import { InvalidIdError, NotFoundError, StoreError, ValidationError } from '../../../common/errors.js';
import { MESSAGES, ObservationService, parseObjectId, toObservationView } from '../observation.service.js';
import { MemoryObservationStore } from './memory.store.js';

const NOW = new Date('2026-10-18T12:00:00.000Z');

const DEER = {
  species: 'Deer',
  gender: 'Male',
  quantity: 2,
  latitude: 45.1,
  longitude: -70.2,
  userId: 'u1',
};

describe('ObservationService', () => {
  let store: MemoryObservationStore;
  let service: ObservationService;
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MemoryObservationStore();
    service = new ObservationService({
      store,
      logger: mockLogger,
      clock: { utcNow: () => NOW },
    });
  });

  describe('add', () => {
    it('should return a 24-character hex id', async () => {
      const id = await service.add(DEER);

      expect(id).toMatch(/^[0-9a-f]{24}$/);
      expect(store.size).toBe(1);
    });

    it('should round-trip the six fields with a server timestamp', async () => {
      const id = await service.add({ ...DEER, quantity: '2', timestamp: '1999-01-01T00:00:00Z' });

      const observation = await service.getById(id);

      expect(observation).toEqual({
        _id: id,
        ...DEER,
        timestamp: '2026-10-18T12:00:00.000Z',
      });
    });

    it('should create distinct records for identical submissions', async () => {
      const first = await service.add(DEER);
      const second = await service.add(DEER);

      expect(first).not.toBe(second);
      expect(store.size).toBe(2);
    });

    it('should log the created id', async () => {
      const id = await service.add(DEER);

      expect(mockLogger.info).toHaveBeenCalledWith(
        { id, species: 'Deer', quantity: 2, userId: 'u1' },
        '[Observation] Created',
      );
    });

    it('should not touch the store when validation fails', async () => {
      const insert = vi.spyOn(store, 'insert');

      await expect(service.add({ ...DEER, gender: 'Cat' })).rejects.toBeInstanceOf(ValidationError);
      expect(insert).not.toHaveBeenCalled();
    });

    it('should wrap store failures in StoreError with the cause kept', async () => {
      const cause = new Error('connection refused');
      store.failWith = cause;

      const err = await service.add(DEER).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      expect(err).toMatchObject({ message: 'Failed to add observation', statusCode: 500, cause });
    });
  });

  describe('listAll', () => {
    it('should return an empty list for an empty store', async () => {
      expect(await service.listAll()).toEqual([]);
    });

    it('should keep insertion order', async () => {
      const a = await service.add({ ...DEER, species: 'Elk' });
      const b = await service.add({ ...DEER, species: 'Moose' });

      const all = await service.listAll();

      expect(all.map((o) => [o._id, o.species])).toEqual([
        [a, 'Elk'],
        [b, 'Moose'],
      ]);
      expect(all[0].timestamp).toBe('2026-10-18T12:00:00.000Z');
    });

    it('should raise StoreError for a stored document whose timestamp cannot be rendered', async () => {
      await service.add(DEER);
      const [doc] = await store.findAll();
      vi.spyOn(store, 'findAll').mockResolvedValue([{ ...doc, timestamp: new Date('not a date') }]);

      const err = await service.listAll().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      expect(err).toMatchObject({ message: 'Failed to fetch observations', statusCode: 500 });
    });

    it('should raise StoreError when the store is unreachable', async () => {
      store.failWith = new Error('timeout');

      await expect(service.listAll()).rejects.toThrow(MESSAGES.LIST_FAILED);
    });
  });

  describe('getById', () => {
    it('should raise NotFoundError for an unknown id', async () => {
      await expect(service.getById(new ObjectId().toHexString())).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should raise InvalidIdError for a malformed id without querying', async () => {
      const findById = vi.spyOn(store, 'findById');

      const err = await service.getById('not-an-id').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidIdError);
      expect(err).toMatchObject({ message: 'Failed to fetch observation', statusCode: 500 });
      expect(findById).not.toHaveBeenCalled();
    });

    it('should raise StoreError for a stored document whose timestamp cannot be rendered', async () => {
      const id = await service.add(DEER);
      const doc = await store.findById(ObjectId.createFromHexString(id));
      expect(doc).not.toBeNull();
      if (!doc) return;
      vi.spyOn(store, 'findById').mockResolvedValue({ ...doc, timestamp: new Date('not a date') });

      const err = await service.getById(id).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      expect(err).toMatchObject({ message: 'Failed to fetch observation', statusCode: 500 });
    });

    it('should accept an upper-case hex id', async () => {
      const id = await service.add(DEER);

      const observation = await service.getById(id.toUpperCase());

      expect(observation._id).toBe(id);
    });
  });

  describe('deleteById', () => {
    it('should remove the record', async () => {
      const id = await service.add(DEER);

      await service.deleteById(id);

      expect(store.size).toBe(0);
      await expect(service.getById(id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should raise NotFoundError on the second delete', async () => {
      const id = await service.add(DEER);
      await service.deleteById(id);

      await expect(service.deleteById(id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should raise InvalidIdError with the delete message', async () => {
      await expect(service.deleteById('123')).rejects.toThrow('Failed to delete observation');
    });

    it('should raise StoreError when the store fails', async () => {
      const id = await service.add(DEER);
      store.failWith = new Error('socket hang up');

      await expect(service.deleteById(id)).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe('checkHealth', () => {
    it('should report true when the store answers', async () => {
      expect(await service.checkHealth()).toBe(true);
    });

    it('should report false and warn when the ping fails', async () => {
      store.failWith = new Error('down');

      expect(await service.checkHealth()).toBe(false);
      expect(mockLogger.warn).toHaveBeenCalledTimes(1);
    });
  });
});

describe('parseObjectId', () => {
  it('should reject a 12-character string', () => {
    expect(() => parseObjectId('abcdefghijkl', 'nope')).toThrow(InvalidIdError);
  });

  it('should parse a 24-hex string', () => {
    expect(parseObjectId('65a1b2c3d4e5f60718293a4b', 'nope').toHexString()).toBe('65a1b2c3d4e5f60718293a4b');
  });
});

describe('toObservationView', () => {
  it('should render the id as hex and the timestamp as UTC ISO-8601', () => {
    const _id = ObjectId.createFromHexString('65a1b2c3d4e5f60718293a4b');

    const view = toObservationView({
      _id,
      species: 'Heron',
      gender: 'Unknown',
      quantity: 1,
      latitude: 10.5,
      longitude: 20.25,
      userId: 'u9',
      timestamp: new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 6)),
    });

    expect(view).toEqual({
      _id: '65a1b2c3d4e5f60718293a4b',
      species: 'Heron',
      gender: 'Unknown',
      quantity: 1,
      latitude: 10.5,
      longitude: 20.25,
      userId: 'u9',
      timestamp: '2026-01-02T03:04:05.006Z',
    });
  });
});
