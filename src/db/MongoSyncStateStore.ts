import type {StoreStats, SyncStateStore} from '../events/store.js';
import type {
  ProcessedMessageRecord,
  SyncedEvent,
  SyncedEventInput,
} from '../types/events.js';
import {ProcessedMessageRepository} from './repositories/ProcessedMessageRepository.js';
import {SyncedEventRepository} from './repositories/SyncedEventRepository.js';

/**
 * Sync State Store on MongoDB. Each put is a single-document write
 * conditioned on the record's version.
 */
export class MongoSyncStateStore implements SyncStateStore {
  constructor(
    private readonly events = SyncedEventRepository.getInstance(),
    private readonly messages = ProcessedMessageRepository.getInstance(),
  ) {}

  async initialize(): Promise<void> {
    await this.events.initializeIndexes();
    await this.messages.initializeIndexes();
  }

  get(identityKey: string): Promise<SyncedEvent | null> {
    return this.events.findByIdentityKey(identityKey);
  }

  put(event: SyncedEventInput, expectedVersion: number | null): Promise<SyncedEvent> {
    return expectedVersion === null
      ? this.events.insertFirstVersion(event)
      : this.events.replaceIfVersion(event, expectedVersion);
  }

  listActiveForThread(threadId: string): Promise<SyncedEvent[]> {
    return this.events.findActiveByThread(threadId);
  }

  markMessageProcessed(record: ProcessedMessageRecord): Promise<void> {
    return this.messages.upsert(record);
  }

  async isMessageProcessed(messageId: string): Promise<boolean> {
    const record = await this.messages.findByMessageId(messageId);
    return record !== null;
  }

  async getStats(): Promise<StoreStats> {
    const [{active, cancelled}, processedMessages] = await Promise.all([
      this.events.countByStatus(),
      this.messages.count(),
    ]);
    return {activeEvents: active, cancelledEvents: cancelled, processedMessages};
  }

  pruneProcessedMessages(before: Date): Promise<number> {
    return this.messages.deleteProcessedBefore(before);
  }
}
