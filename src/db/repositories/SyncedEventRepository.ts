import {MongoServerError} from 'mongodb';
import {ConcurrentModificationError} from '../../events/errors.js';
import type {SyncedEvent, SyncedEventInput} from '../../types/events.js';
import {SyncedEventDocument, toSyncedEvent} from '../models/SyncedEvent.js';
import {BaseRepository, IndexDefinition} from './BaseRepository.js';

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === DUPLICATE_KEY;
}

/**
 * Repository for the `synced_events` collection. Writes are
 * compare-and-set on `version`.
 */
export class SyncedEventRepository extends BaseRepository<SyncedEventDocument> {
  private static instance: SyncedEventRepository;

  protected readonly indexes: IndexDefinition[] = [
    {spec: {identityKey: 1}, options: {unique: true}},
    {spec: {sourceThreadId: 1, status: 1}},
  ];

  private constructor() {
    super('synced_events');
  }

  public static getInstance(): SyncedEventRepository {
    if (!SyncedEventRepository.instance) {
      SyncedEventRepository.instance = new SyncedEventRepository();
    }
    return SyncedEventRepository.instance;
  }

  async findByIdentityKey(identityKey: string): Promise<SyncedEvent | null> {
    const collection = await this.getCollection();
    const doc = await collection.findOne({identityKey});
    return doc ? toSyncedEvent(doc) : null;
  }

  async findActiveByThread(threadId: string): Promise<SyncedEvent[]> {
    const collection = await this.getCollection();
    const docs = await collection
      .find({sourceThreadId: threadId, status: 'active'})
      .toArray();
    return docs.map(toSyncedEvent);
  }

  /**
   * Inserts version 1. The unique index on identityKey turns a racing
   * insert into a ConcurrentModificationError.
   */
  async insertFirstVersion(event: SyncedEventInput): Promise<SyncedEvent> {
    const collection = await this.getCollection();
    const doc: SyncedEventDocument = {...event, version: 1};
    try {
      await collection.insertOne(doc);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConcurrentModificationError(event.identityKey, null);
      }
      throw error;
    }
    return {...event, version: 1};
  }

  /**
   * Replaces the record if it is still at `expectedVersion`.
   * @throws ConcurrentModificationError when the version has moved on
   */
  async replaceIfVersion(
    event: SyncedEventInput,
    expectedVersion: number,
  ): Promise<SyncedEvent> {
    const collection = await this.getCollection();
    const version = expectedVersion + 1;
    const result = await collection.updateOne(
      {identityKey: event.identityKey, version: expectedVersion},
      {
        $set: {
          externalEventId: event.externalEventId,
          lastSyncedStateHash: event.lastSyncedStateHash,
          lastSyncedAt: event.lastSyncedAt,
          status: event.status,
          sourceThreadId: event.sourceThreadId,
          sourceMessageId: event.sourceMessageId,
          title: event.title,
          version,
        },
      },
    );
    if (result.matchedCount === 0) {
      throw new ConcurrentModificationError(event.identityKey, expectedVersion);
    }
    return {...event, version};
  }

  async countByStatus(): Promise<{active: number; cancelled: number}> {
    const [active, cancelled] = await Promise.all([
      this.count({status: 'active'}),
      this.count({status: 'cancelled'}),
    ]);
    return {active, cancelled};
  }
}
