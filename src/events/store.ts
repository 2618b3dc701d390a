import type {
  ProcessedMessageRecord,
  SyncedEvent,
  SyncedEventInput,
} from '../types/events.js';

export interface StoreStats {
  activeEvents: number;
  cancelledEvents: number;
  processedMessages: number;
}

/**
 * Durable record of what has been synced. Writes to one identity key are
 * atomic compare-and-set on its version; there is no cross-key atomicity.
 */
export interface SyncStateStore {
  get(identityKey: string): Promise<SyncedEvent | null>;

  /**
   * Writes the record if its stored version still equals
   * `expectedVersion` (null: no record may exist yet) and returns it with
   * the next version.
   * @throws ConcurrentModificationError when the version has moved on
   */
  put(
    event: SyncedEventInput,
    expectedVersion: number | null,
  ): Promise<SyncedEvent>;

  listActiveForThread(threadId: string): Promise<SyncedEvent[]>;

  markMessageProcessed(record: ProcessedMessageRecord): Promise<void>;

  /** @throws ProcessedMessageIntegrityError for a corrupt stored record */
  isMessageProcessed(messageId: string): Promise<boolean>;

  getStats(): Promise<StoreStats>;

  /** Deletes processed-message records older than `before`; returns how many. */
  pruneProcessedMessages(before: Date): Promise<number>;
}
