import {Collection, MongoClient, MongoServerError, ObjectId} from 'mongodb';
import {ConcurrentModificationError} from '../../../events/errors.js';
import type {SyncedEventInput} from '../../../types/events.js';
import {DatabaseConnection} from '../../connection.js';
import {SyncedEventRepository} from '../SyncedEventRepository.js';

const KEY = 'a'.repeat(64);

const event: SyncedEventInput = {
  identityKey: KEY,
  externalEventId: KEY,
  lastSyncedStateHash: 'b'.repeat(64),
  lastSyncedAt: new Date('2024-01-01T09:00:00Z'),
  status: 'active',
  sourceThreadId: 'thread-a',
  sourceMessageId: 'msg-1',
  title: 'Team lunch',
};

describe('SyncedEventRepository', () => {
  // never connected: every collection call below is stubbed
  const client = new MongoClient('mongodb://localhost:27017');
  let repository: SyncedEventRepository;

  beforeEach(() => {
    jest
      .spyOn(DatabaseConnection.getInstance(), 'connect')
      .mockResolvedValue(client.db('inbox_event_sync_test'));
    repository = SyncedEventRepository.getInstance();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('insertFirstVersion', () => {
    it('should store version 1', async () => {
      const insertOne = jest
        .spyOn(Collection.prototype, 'insertOne')
        .mockResolvedValue({acknowledged: true, insertedId: new ObjectId()});

      const stored = await repository.insertFirstVersion(event);

      expect(stored).toEqual({...event, version: 1});
      expect(insertOne).toHaveBeenCalledWith({...event, version: 1});
    });

    it('should turn a duplicate key into a concurrent modification', async () => {
      jest
        .spyOn(Collection.prototype, 'insertOne')
        .mockRejectedValue(
          new MongoServerError({message: 'E11000 duplicate key error', code: 11000}),
        );

      await expect(repository.insertFirstVersion(event)).rejects.toBeInstanceOf(
        ConcurrentModificationError,
      );
    });

    it('should pass other server errors through', async () => {
      const failure = new MongoServerError({message: 'not primary', code: 10107});
      jest.spyOn(Collection.prototype, 'insertOne').mockRejectedValue(failure);

      await expect(repository.insertFirstVersion(event)).rejects.toBe(failure);
    });
  });

  describe('replaceIfVersion', () => {
    it('should write the next version when the stored one matches', async () => {
      const updateOne = jest.spyOn(Collection.prototype, 'updateOne').mockResolvedValue({
        acknowledged: true,
        matchedCount: 1,
        modifiedCount: 1,
        upsertedCount: 0,
        upsertedId: null,
      });

      const stored = await repository.replaceIfVersion({...event, status: 'cancelled'}, 2);

      expect(stored).toEqual({...event, status: 'cancelled', version: 3});
      expect(updateOne).toHaveBeenCalledWith(
        {identityKey: KEY, version: 2},
        {$set: expect.objectContaining({status: 'cancelled', version: 3})},
      );
    });

    it('should raise a concurrent modification when no record matches', async () => {
      jest.spyOn(Collection.prototype, 'updateOne').mockResolvedValue({
        acknowledged: true,
        matchedCount: 0,
        modifiedCount: 0,
        upsertedCount: 0,
        upsertedId: null,
      });

      await expect(repository.replaceIfVersion(event, 2)).rejects.toThrow(
        `Synced event ${KEY} changed concurrently (expected version 2)`,
      );
    });
  });
});
